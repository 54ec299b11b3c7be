import type {
  GlucoseAlertType,
  GlucosePattern,
  GlucosePrediction,
  GlucoseStatus,
  HealthRecommendation,
  TrendDirection,
} from "@glucocare/shared";

export const TARGET_RANGE = { low: 70, high: 180 } as const;

// Change that counts as rapid, and how far back the previous reading may be
export const RAPID_CHANGE_MG_DL = 40;
export const RAPID_CHANGE_WINDOW_MS = 30 * 60 * 1000;

const HOUR_MS = 60 * 60 * 1000;

export interface TimedLevel {
  level: number;
  timestamp: Date;
}

export function glucoseStatus(level: number): GlucoseStatus {
  if (level < TARGET_RANGE.low) return "Low";
  if (level <= TARGET_RANGE.high) return "Normal";
  return "High";
}

export function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Population standard deviation; 0 for no values. */
export function standardDeviation(values: number[]): number {
  if (values.length === 0) return 0;
  const avg = mean(values);
  return Math.sqrt(mean(values.map((v) => (v - avg) ** 2)));
}

export interface TimeInRange {
  inRange: number;
  belowRange: number;
  aboveRange: number;
}

/** Percentages of readings in, below and above 70-180 mg/dL. */
export function timeInRange(levels: number[]): TimeInRange {
  if (levels.length === 0) return { inRange: 0, belowRange: 0, aboveRange: 0 };
  const pct = (n: number) => (n / levels.length) * 100;
  return {
    inRange: pct(levels.filter((l) => l >= TARGET_RANGE.low && l <= TARGET_RANGE.high).length),
    belowRange: pct(levels.filter((l) => l < TARGET_RANGE.low).length),
    aboveRange: pct(levels.filter((l) => l > TARGET_RANGE.high).length),
  };
}

/** Last minus first level, 0 with fewer than two readings. */
export function levelChange(levels: number[]): number {
  if (levels.length < 2) return 0;
  return levels[levels.length - 1] - levels[0];
}

export function trendDirection(change: number): TrendDirection {
  if (change > 5) return "Rising";
  if (change < -5) return "Falling";
  return "Stable";
}

/**
 * Alerts raised by a new reading. `previous` is the latest earlier reading;
 * it only counts when taken within the rapid-change window.
 */
export function alertsForReading(
  reading: TimedLevel,
  previous: TimedLevel | undefined,
): GlucoseAlertType[] {
  const alerts: GlucoseAlertType[] = [];
  if (reading.level < TARGET_RANGE.low) alerts.push("Low Glucose");
  if (reading.level > TARGET_RANGE.high) alerts.push("High Glucose");

  if (previous) {
    const elapsed = reading.timestamp.getTime() - previous.timestamp.getTime();
    const change = reading.level - previous.level;
    if (elapsed >= 0 && elapsed <= RAPID_CHANGE_WINDOW_MS) {
      if (change > RAPID_CHANGE_MG_DL) alerts.push("Rapid Rise");
      if (change < -RAPID_CHANGE_MG_DL) alerts.push("Rapid Fall");
    }
  }
  return alerts;
}

/** Readings between 06:00 and 09:59 local time averaging above 140. */
export function dawnPhenomenon(
  readings: Array<{ level: number; hour: number }>,
): GlucosePattern | null {
  const morning = readings.filter((r) => r.hour >= 6 && r.hour <= 9);
  if (morning.length < 5 || mean(morning.map((r) => r.level)) <= 140) return null;
  return {
    type: "dawn_phenomenon",
    description: "Elevated morning glucose levels detected",
    confidence: 0.8,
  };
}

/** Meals followed by a reading above 180 between one and three hours later. */
export function postMealSpikes(
  meals: Array<{ name: string; carbs: number; timestamp: Date }>,
  readings: TimedLevel[],
): GlucosePattern[] {
  const patterns: GlucosePattern[] = [];
  for (const meal of meals) {
    const after = readings.filter((r) => {
      const diff = r.timestamp.getTime() - meal.timestamp.getTime();
      return diff > HOUR_MS && diff < 3 * HOUR_MS;
    });
    const peak = Math.max(...after.map((r) => r.level));
    if (after.length > 0 && peak > TARGET_RANGE.high) {
      patterns.push({
        type: "post_meal_spike",
        description: `High glucose spike after ${meal.name} (${meal.carbs}g carbs)`,
        confidence: 0.7,
      });
    }
  }
  return patterns;
}

/** Direction of the last ten readings; needs at least ten. */
export function glucosePredictions(levels: number[]): GlucosePrediction[] {
  if (levels.length < 10) return [];
  const change = levelChange(levels.slice(-10));
  if (change > 5) {
    return [{ description: "Rising trend detected", timeframe: "Next 2 hours", confidence: 0.6 }];
  }
  if (change < -5) {
    return [{ description: "Declining trend detected", timeframe: "Next 2 hours", confidence: 0.6 }];
  }
  return [];
}

export function glucoseRecommendations(
  averageLevel: number,
  inRange: number,
): HealthRecommendation[] {
  const recommendations: HealthRecommendation[] = [];
  if (inRange < 70) {
    recommendations.push({
      title: "Improve Time in Range",
      description: `Your time in range is ${Math.trunc(inRange)}%. Aim for 70% or higher.`,
      priority: "high",
      category: "glucose",
    });
  }
  if (averageLevel > 180) {
    recommendations.push({
      title: "High Average Glucose",
      description: `Your average glucose is ${Math.trunc(averageLevel)}mg/dL. Consider consulting your healthcare provider.`,
      priority: "high",
      category: "glucose",
    });
  }
  return recommendations;
}
