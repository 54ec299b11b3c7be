import {
  HEALTH_METRIC_CONFIG,
  type GoalStatus,
  type HealthInsight,
  type HealthMetricType,
  type SaveHealthMetricsDto,
} from "@glucocare/shared";

export function displayValue(type: HealthMetricType, value: number): string {
  const { unit, decimals } = HEALTH_METRIC_CONFIG[type];
  const amount = decimals === 0 ? String(Math.trunc(value)) : value.toFixed(decimals);
  return unit.startsWith("°") ? `${amount}${unit}` : `${amount} ${unit}`;
}

/** One entry per provided value, in a fixed order. */
export function metricValues(dto: SaveHealthMetricsDto): { type: HealthMetricType; value: number }[] {
  const entries: [HealthMetricType, number | undefined][] = [
    ["heart_rate", dto.heartRate],
    ["systolic_bp", dto.systolicBP],
    ["diastolic_bp", dto.diastolicBP],
    ["weight", dto.weight],
    ["temperature", dto.temperature],
  ];
  return entries.flatMap(([type, value]) => (value === undefined ? [] : [{ type, value }]));
}

interface MetricValue {
  type: HealthMetricType;
  value: number;
}

export function heartRateInsight(recent: MetricValue[]): HealthInsight {
  const rates = recent.filter((m) => m.type === "heart_rate").map((m) => m.value);
  const title = "Heart Rate";
  if (rates.length === 0) {
    return { title, message: "Track your heart rate to monitor cardiovascular health" };
  }

  const average = rates.reduce((sum, v) => sum + v, 0) / rates.length;
  if (average > 100) {
    return { title, message: "Your average heart rate is elevated. Consider consulting your doctor." };
  }
  if (average < 60) {
    return {
      title,
      message: "Your heart rate is on the lower side. This could be normal if you're athletic.",
    };
  }
  return { title, message: "Your heart rate is within normal range. Keep up the good work!" };
}

/** Looks at the newest systolic reading; `recent` is newest first. */
export function bloodPressureInsight(recent: MetricValue[]): HealthInsight {
  const title = "Blood Pressure";
  const systolic = recent.find((m) => m.type === "systolic_bp");
  if (!systolic) {
    return { title, message: "Regular blood pressure monitoring helps prevent complications" };
  }
  if (systolic.value > 140) {
    return {
      title,
      message: "Your blood pressure is elevated. Monitor closely and consult your doctor.",
    };
  }
  if (systolic.value > 120) {
    return {
      title,
      message: "Your blood pressure is slightly elevated. Consider lifestyle changes.",
    };
  }
  return { title, message: "Your blood pressure is within normal range." };
}

export function weightInsight(recent: MetricValue[]): HealthInsight {
  const title = "Weight";
  const [latest, previous] = recent.filter((m) => m.type === "weight");
  if (!latest || !previous) {
    return { title, message: "Maintain a healthy weight for better diabetes management" };
  }
  if (Math.abs(latest.value - previous.value) > 2) {
    return {
      title,
      message: "Significant weight change detected. Monitor your diabetes management closely.",
    };
  }
  return { title, message: "Your weight is stable. Great for diabetes management!" };
}

export function goalProgressPercentage(current: number | null, target: number): number {
  if (current === null || target <= 0) return 0;
  return Math.min((current / target) * 100, 100);
}

export function goalStatus(progressPercentage: number): GoalStatus {
  if (progressPercentage >= 100) return "Achieved";
  if (progressPercentage >= 75) return "On Track";
  if (progressPercentage >= 50) return "Needs Attention";
  return "Off Track";
}
