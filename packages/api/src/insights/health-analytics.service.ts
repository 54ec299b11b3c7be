import { Injectable } from "@nestjs/common";
import type { HealthReport } from "@glucocare/shared";
import { dayjs } from "../common/time";
import { ExerciseService } from "../exercise/exercise.service";
import { GlucoseService } from "../glucose/glucose.service";
import { MealsService } from "../meals/meals.service";
import { exerciseImpact, nutritionPatterns, riskAssessment } from "./health-analytics";

export const HEALTH_WINDOW_DAYS = 30;

/** Correlates glucose with workouts and meals over a trailing window. */
@Injectable()
export class HealthAnalyticsService {
  constructor(
    private glucose: GlucoseService,
    private meals: MealsService,
    private exercise: ExerciseService,
  ) {}

  report(userId: string, days = HEALTH_WINDOW_DAYS, now = new Date()): HealthReport {
    const from = dayjs.utc(now).subtract(days, "day").toDate();
    const readings = this.glucose.readingsBetween(userId, from, now);

    const impact = exerciseImpact(this.exercise.workoutsBetween(userId, from, now), readings);
    const nutrition = nutritionPatterns(this.meals.mealsBetween(userId, from, now));

    return {
      windowDays: days,
      exerciseImpact: impact,
      nutrition,
      risk: riskAssessment(readings.map((r) => r.level)),
      recommendations: [...impact.recommendations, ...nutrition.recommendations],
    };
  }
}
