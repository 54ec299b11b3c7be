import { Test } from "@nestjs/testing";
import { ForbiddenException } from "@nestjs/common";
import type { CreateWorkoutDto } from "@glucocare/shared";
import { ExerciseError } from "../common/domain-error";
import { DatabaseService } from "../database/database.service";
import { createTestDatabase, insertTestUser } from "../database/testing";
import { UsersService } from "../users/users.service";
import { ExerciseService } from "./exercise.service";

// Wednesday
const NOW = new Date("2024-03-13T15:00:00.000Z");

describe("ExerciseService", () => {
  let service: ExerciseService;
  let database: DatabaseService;
  let users: { getTimezone: jest.Mock };
  let userId: string;

  beforeEach(async () => {
    database = createTestDatabase();
    userId = insertTestUser(database).id;
    users = { getTimezone: jest.fn().mockReturnValue("UTC") };

    const module = await Test.createTestingModule({
      providers: [
        ExerciseService,
        { provide: DatabaseService, useValue: database },
        { provide: UsersService, useValue: users },
      ],
    }).compile();

    service = module.get(ExerciseService);
  });

  afterEach(() => database.onModuleDestroy());

  const log = (overrides: Partial<CreateWorkoutDto>) =>
    service.create(
      userId,
      { type: "Walking", duration: 30, intensity: "Moderate", calories: 100, ...overrides },
      NOW,
    );

  const seedWeek = () => {
    // Saturday of the previous week
    log({ type: "Cycling", duration: 60, calories: 200, timestamp: "2024-03-09T10:00:00.000Z" });
    log({ type: "Walking", duration: 45, calories: 150, timestamp: "2024-03-11T10:00:00.000Z" });
    log({
      type: "Running",
      duration: 30,
      calories: 300,
      distance: 3.1,
      timestamp: "2024-03-13T08:00:00.000Z",
    });
  };

  // -- workouts -----------------------------------------------------------------

  it("logs workouts with their category", () => {
    expect(log({ type: "Yoga", intensity: "Light" })).toMatchObject({
      type: "Yoga",
      category: "Flexibility",
      intensity: "Light",
      distance: null,
      timestamp: NOW.toISOString(),
    });
  });

  it("rejects workouts in the future", () => {
    expect(() => log({ timestamp: "2024-03-14T00:00:00.000Z" })).toThrow(ExerciseError);
  });

  it("filters workouts by type", () => {
    seedWeek();
    const page = service.findAll(userId, { type: "Running", limit: 10, offset: 0 });

    expect(page.total).toBe(1);
    expect(page.data[0]).toMatchObject({ type: "Running", distance: 3.1 });
  });

  it("updates and removes only the owner's workouts", () => {
    const workout = log({});
    const other = insertTestUser(database);

    expect(() => service.update(other.id, workout.id, { duration: 10 })).toThrow(
      ForbiddenException,
    );
    expect(service.update(userId, workout.id, { duration: 40, notes: "hills" })).toMatchObject({
      duration: 40,
      notes: "hills",
    });
    expect(service.remove(userId, workout.id)).toEqual({ deleted: true });
    expect(service.findAll(userId, { limit: 10, offset: 0 }).total).toBe(0);
  });

  // -- summary & insights -------------------------------------------------------

  it("totals today and the week starting Sunday", () => {
    seedWeek();

    expect(service.summary(userId, NOW)).toEqual({
      todayMinutes: 30,
      todayCalories: 300,
      todayWorkouts: 1,
      weeklyMinutes: 75,
      weeklyGoal: 150,
    });
  });

  it("derives insights from this week's minutes", () => {
    seedWeek();

    expect(service.insights(userId, NOW).map((i) => i.message)).toEqual([
      "Good start! Keep going to reach your weekly goal.",
      "Good exercise routine! This helps with glucose metabolism and cardiovascular health.",
      "Try 3 more 30-minute sessions this week to reach your goal.",
    ]);
  });

  it("summarizes the calendar week and month", () => {
    seedWeek();

    expect(service.analytics(userId, { range: "week" }, NOW)).toEqual({
      range: "week",
      from: "2024-03-10T00:00:00.000Z",
      to: "2024-03-16T23:59:59.999Z",
      totalWorkouts: 2,
      totalDuration: 75,
      totalCalories: 450,
      mostFrequentType: "Walking",
      mostCommonIntensity: "Moderate",
    });
    expect(service.analytics(userId, { range: "month" }, NOW)).toMatchObject({
      to: "2024-03-31T23:59:59.999Z",
      totalWorkouts: 3,
      totalCalories: 650,
      mostFrequentType: "Cycling",
    });
  });

  // -- goals --------------------------------------------------------------------

  it("measures goals over their current period", () => {
    seedWeek();
    const goal = (type: "Duration" | "Frequency" | "Calories" | "Distance", period: "Daily" | "Weekly" | "Monthly" | "Yearly", target: number) =>
      service.createGoal(userId, { type, period, target, isActive: true }, NOW);

    expect(goal("Duration", "Weekly", 150)).toMatchObject({ unit: "min", current: 75, progress: 0.5 });
    expect(goal("Frequency", "Daily", 2)).toMatchObject({ unit: "workouts", current: 1, progress: 0.5 });
    expect(goal("Distance", "Monthly", 2)).toMatchObject({ unit: "mi", current: 3.1, progress: 1 });
    expect(goal("Calories", "Yearly", 0)).toMatchObject({ unit: "kcal", current: 650, progress: 0 });
  });

  it("updates and removes goals", () => {
    const goal = service.createGoal(
      userId,
      { type: "Duration", period: "Weekly", target: 150, isActive: true },
      NOW,
    );
    const other = insertTestUser(database);

    expect(() => service.removeGoal(other.id, goal.id)).toThrow(ForbiddenException);
    expect(service.updateGoal(userId, goal.id, { target: 200, isActive: false }, NOW)).toMatchObject({
      target: 200,
      isActive: false,
    });
    expect(service.removeGoal(userId, goal.id)).toEqual({ deleted: true });
    expect(service.goals(userId, NOW)).toEqual([]);
  });
});
