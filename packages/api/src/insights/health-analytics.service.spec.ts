import { Test } from "@nestjs/testing";
import { ExerciseService } from "../exercise/exercise.service";
import { GlucoseService } from "../glucose/glucose.service";
import { MealsService } from "../meals/meals.service";
import { HealthAnalyticsService } from "./health-analytics.service";

const NOW = new Date("2024-03-31T12:00:00.000Z");

describe("HealthAnalyticsService", () => {
  let service: HealthAnalyticsService;
  let glucose: { readingsBetween: jest.Mock };
  let meals: { mealsBetween: jest.Mock };
  let exercise: { workoutsBetween: jest.Mock };

  beforeEach(async () => {
    glucose = {
      readingsBetween: jest.fn().mockReturnValue([
        { level: 250, timestamp: new Date("2024-03-30T07:00:00.000Z") },
        { level: 150, timestamp: new Date("2024-03-30T09:00:00.000Z") },
      ]),
    };
    meals = { mealsBetween: jest.fn().mockReturnValue([{ carbs: 60 }]) };
    exercise = {
      workoutsBetween: jest
        .fn()
        .mockReturnValue([{ timestamp: new Date("2024-03-30T08:00:00.000Z") }]),
    };

    const module = await Test.createTestingModule({
      providers: [
        HealthAnalyticsService,
        { provide: GlucoseService, useValue: glucose },
        { provide: MealsService, useValue: meals },
        { provide: ExerciseService, useValue: exercise },
      ],
    }).compile();

    service = module.get(HealthAnalyticsService);
  });

  it("reads the trailing 30 days", () => {
    service.report("user-1", undefined, NOW);

    const from = new Date("2024-03-01T12:00:00.000Z");
    expect(glucose.readingsBetween).toHaveBeenCalledWith("user-1", from, NOW);
    expect(meals.mealsBetween).toHaveBeenCalledWith("user-1", from, NOW);
    expect(exercise.workoutsBetween).toHaveBeenCalledWith("user-1", from, NOW);
  });

  it("combines exercise, nutrition and risk findings", () => {
    const report = service.report("user-1", 7, NOW);

    expect(report.windowDays).toBe(7);
    expect(report.exerciseImpact.averageImprovement).toBe(100);
    expect(report.nutrition.highCarbMeals).toBe(1);
    expect(report.risk).toMatchObject({ overallRisk: "high", averageLevel: 200, variability: 50 });
    expect(report.recommendations.map((r) => r.title)).toEqual([
      "Exercise Benefits Detected",
      "High Carb Meal Impact",
    ]);
  });
});
