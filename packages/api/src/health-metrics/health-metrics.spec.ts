import {
  bloodPressureInsight,
  displayValue,
  goalProgressPercentage,
  goalStatus,
  heartRateInsight,
  metricValues,
  weightInsight,
} from "./health-metrics";

describe("health metrics", () => {
  it("formats values per metric type", () => {
    expect(displayValue("heart_rate", 72.9)).toBe("72 bpm");
    expect(displayValue("systolic_bp", 121)).toBe("121 mmHg");
    expect(displayValue("weight", 180)).toBe("180.0 lbs");
    expect(displayValue("temperature", 98.64)).toBe("98.6°F");
  });

  it("keeps only provided values", () => {
    expect(metricValues({ weight: 180, heartRate: 70 })).toEqual([
      { type: "heart_rate", value: 70 },
      { type: "weight", value: 180 },
    ]);
  });

  // -- insights -----------------------------------------------------------------

  it("rates the average heart rate", () => {
    const rates = (...values: number[]) =>
      heartRateInsight(values.map((value) => ({ type: "heart_rate" as const, value }))).message;

    expect(rates(110, 100)).toBe(
      "Your average heart rate is elevated. Consider consulting your doctor.",
    );
    expect(rates(55)).toBe(
      "Your heart rate is on the lower side. This could be normal if you're athletic.",
    );
    expect(rates(60, 100)).toBe("Your heart rate is within normal range. Keep up the good work!");
    expect(rates()).toBe("Track your heart rate to monitor cardiovascular health");
  });

  it("uses the newest systolic reading", () => {
    const insight = bloodPressureInsight([
      { type: "diastolic_bp", value: 95 },
      { type: "systolic_bp", value: 130 },
      { type: "systolic_bp", value: 160 },
    ]);
    expect(insight).toEqual({
      title: "Blood Pressure",
      message: "Your blood pressure is slightly elevated. Consider lifestyle changes.",
    });
    expect(bloodPressureInsight([{ type: "diastolic_bp", value: 95 }]).message).toBe(
      "Regular blood pressure monitoring helps prevent complications",
    );
  });

  it("compares the two newest weights", () => {
    const weights = (...values: number[]) =>
      weightInsight(values.map((value) => ({ type: "weight" as const, value }))).message;

    expect(weights(180, 182)).toBe("Your weight is stable. Great for diabetes management!");
    expect(weights(180, 182.5)).toBe(
      "Significant weight change detected. Monitor your diabetes management closely.",
    );
    expect(weights(180)).toBe("Maintain a healthy weight for better diabetes management");
  });

  // -- goals --------------------------------------------------------------------

  it("derives goal status from capped progress", () => {
    expect(goalProgressPercentage(90, 120)).toBe(75);
    expect(goalProgressPercentage(300, 150)).toBe(100);
    expect(goalProgressPercentage(80, 0)).toBe(0);
    expect(goalProgressPercentage(null, 150)).toBe(0);

    expect([100, 75, 50, 49.9].map(goalStatus)).toEqual([
      "Achieved",
      "On Track",
      "Needs Attention",
      "Off Track",
    ]);
  });
});
