import type {
  ExerciseImpactInsight,
  NutritionPatternInsight,
  RiskAssessment,
  RiskFactor,
  RiskLevel,
} from "@glucocare/shared";
import { mean, standardDeviation } from "../glucose/glucose-analytics";

const IMPACT_WINDOW_MS = 2 * 60 * 60 * 1000;
export const HIGH_CARB_THRESHOLD = 45;

interface TimedLevel {
  level: number;
  timestamp: Date;
}

/**
 * Average drop in glucose around workouts: mean of readings in the two hours
 * before minus mean in the two hours after. Readings at the workout instant or
 * exactly two hours away fall outside both windows.
 */
export function exerciseImpact(
  workouts: { timestamp: Date }[],
  readings: TimedLevel[],
): ExerciseImpactInsight {
  const improvements: number[] = [];

  for (const workout of workouts) {
    const at = workout.timestamp.getTime();
    const before = readings
      .filter((r) => at - r.timestamp.getTime() > 0 && at - r.timestamp.getTime() < IMPACT_WINDOW_MS)
      .map((r) => r.level);
    const after = readings
      .filter((r) => r.timestamp.getTime() - at > 0 && r.timestamp.getTime() - at < IMPACT_WINDOW_MS)
      .map((r) => r.level);

    if (before.length > 0 && after.length > 0) improvements.push(mean(before) - mean(after));
  }

  const averageImprovement = mean(improvements);
  return {
    averageImprovement,
    workoutsAnalyzed: improvements.length,
    recommendations:
      averageImprovement > 0
        ? [
            {
              title: "Exercise Benefits Detected",
              description: `Your glucose levels improve by an average of ${Math.trunc(averageImprovement)}mg/dL after exercise`,
              priority: "high",
              category: "exercise",
            },
          ]
        : [],
  };
}

export function nutritionPatterns(meals: { carbs: number }[]): NutritionPatternInsight {
  const highCarbMeals = meals.filter((m) => m.carbs > HIGH_CARB_THRESHOLD).length;
  return {
    highCarbMeals,
    recommendations:
      highCarbMeals > 0
        ? [
            {
              title: "High Carb Meal Impact",
              description: `Consider reducing carbs in meals to ${HIGH_CARB_THRESHOLD}g or less for better glucose control`,
              priority: "medium",
              category: "nutrition",
            },
          ]
        : [],
  };
}

const RISK_RECOMMENDATIONS: Record<string, string> = {
  "High glucose variability": "Focus on consistent meal timing and carb counting",
  "Elevated average glucose": "Consult with your healthcare provider about medication adjustments",
};

export function riskAssessment(levels: number[]): RiskAssessment {
  const factors: RiskFactor[] = [];
  let overallRisk: RiskLevel = "low";
  const averageLevel = mean(levels);
  const variability = standardDeviation(levels);

  if (levels.length > 0) {
    if (variability > 50) {
      factors.push({ description: "High glucose variability", severity: "high" });
      overallRisk = "high";
    } else if (variability > 30) {
      factors.push({ description: "Moderate glucose variability", severity: "medium" });
      overallRisk = "medium";
    }
    if (averageLevel > 180) {
      factors.push({ description: "Elevated average glucose", severity: "high" });
      overallRisk = "high";
    }
  }

  return {
    overallRisk,
    variability,
    averageLevel,
    factors,
    recommendations: factors.flatMap((f) => {
      const advice = RISK_RECOMMENDATIONS[f.description];
      return advice ? [advice] : [];
    }),
  };
}
