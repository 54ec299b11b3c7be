import { exerciseImpact, nutritionPatterns, riskAssessment } from "./health-analytics";

const at = (time: string) => new Date(`2024-03-10T${time}:00.000Z`);

describe("health analytics", () => {
  describe("exerciseImpact", () => {
    const readings = [
      { level: 180, timestamp: at("11:00") },
      { level: 160, timestamp: at("11:30") },
      { level: 300, timestamp: at("12:00") },
      { level: 130, timestamp: at("13:00") },
      { level: 200, timestamp: at("14:00") },
    ];

    it("compares the two hours before and after each workout", () => {
      // 20:00 has no readings around it and is skipped
      const impact = exerciseImpact([{ timestamp: at("12:00") }, { timestamp: at("20:00") }], readings);

      expect(impact).toEqual({
        averageImprovement: 40,
        workoutsAnalyzed: 1,
        recommendations: [
          {
            title: "Exercise Benefits Detected",
            description: "Your glucose levels improve by an average of 40mg/dL after exercise",
            priority: "high",
            category: "exercise",
          },
        ],
      });
    });

    it("stays quiet when glucose rises after exercise", () => {
      const rising = [
        { level: 100, timestamp: at("11:00") },
        { level: 150, timestamp: at("13:00") },
      ];
      expect(exerciseImpact([{ timestamp: at("12:00") }], rising)).toEqual({
        averageImprovement: -50,
        workoutsAnalyzed: 1,
        recommendations: [],
      });
    });
  });

  it("flags meals above 45g of carbs", () => {
    expect(nutritionPatterns([{ carbs: 45 }, { carbs: 46 }, { carbs: 20 }])).toEqual({
      highCarbMeals: 1,
      recommendations: [
        {
          title: "High Carb Meal Impact",
          description: "Consider reducing carbs in meals to 45g or less for better glucose control",
          priority: "medium",
          category: "nutrition",
        },
      ],
    });
    expect(nutritionPatterns([{ carbs: 45 }]).recommendations).toEqual([]);
  });

  // -- risk ---------------------------------------------------------------------

  describe("riskAssessment", () => {
    it("rates moderate variability as medium risk", () => {
      expect(riskAssessment([100, 200])).toEqual({
        overallRisk: "medium",
        variability: 50,
        averageLevel: 150,
        factors: [{ description: "Moderate glucose variability", severity: "medium" }],
        recommendations: [],
      });
    });

    it("combines high variability with an elevated average", () => {
      const risk = riskAssessment([100, 300]);

      expect(risk.overallRisk).toBe("high");
      expect(risk.factors.map((f) => f.description)).toEqual([
        "High glucose variability",
        "Elevated average glucose",
      ]);
      expect(risk.recommendations).toEqual([
        "Focus on consistent meal timing and carb counting",
        "Consult with your healthcare provider about medication adjustments",
      ]);
    });

    it("flags a steady but high average", () => {
      expect(riskAssessment([190, 190])).toMatchObject({
        overallRisk: "high",
        variability: 0,
        recommendations: ["Consult with your healthcare provider about medication adjustments"],
      });
    });

    it("is low without readings", () => {
      expect(riskAssessment([])).toEqual({
        overallRisk: "low",
        variability: 0,
        averageLevel: 0,
        factors: [],
        recommendations: [],
      });
    });
  });
});
