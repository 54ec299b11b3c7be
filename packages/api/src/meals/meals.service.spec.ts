import { Test } from "@nestjs/testing";
import { ForbiddenException } from "@nestjs/common";
import type { CreateMealDto } from "@glucocare/shared";
import { MealsService } from "./meals.service";
import { DatabaseService } from "../database/database.service";
import { createTestDatabase, insertTestUser } from "../database/testing";
import { UsersService } from "../users/users.service";

describe("MealsService", () => {
  let service: MealsService;
  let database: DatabaseService;
  let users: { getTimezone: jest.Mock };
  let userId: string;

  beforeEach(async () => {
    database = createTestDatabase();
    userId = insertTestUser(database).id;
    users = { getTimezone: jest.fn().mockReturnValue("America/New_York") };

    const module = await Test.createTestingModule({
      providers: [
        MealsService,
        { provide: DatabaseService, useValue: database },
        { provide: UsersService, useValue: users },
      ],
    }).compile();

    service = module.get(MealsService);
  });

  afterEach(() => database.onModuleDestroy());

  const meal = (overrides: Partial<CreateMealDto>): CreateMealDto => ({
    name: "Oatmeal",
    type: "Breakfast",
    carbs: 30,
    protein: 10,
    fat: 5,
    calories: 250,
    fiber: 4,
    sugar: 6,
    sodium: 100,
    ingredients: [],
    ...overrides,
  });

  // -- CRUD -------------------------------------------------------------------

  it("lists meals newest first with pagination", () => {
    service.create(userId, meal({ name: "A", timestamp: "2024-03-08T12:00:00.000Z" }));
    service.create(userId, meal({ name: "B", timestamp: "2024-03-09T12:00:00.000Z" }));
    service.create(userId, meal({ name: "C", timestamp: "2024-03-10T12:00:00.000Z" }));

    const page = service.findAll(userId, { limit: 2, offset: 0 });

    expect(page.total).toBe(3);
    expect(page.data.map((m) => m.name)).toEqual(["C", "B"]);
  });

  it("filters by type and date range", () => {
    service.create(userId, meal({ name: "A", timestamp: "2024-03-08T12:00:00.000Z" }));
    service.create(
      userId,
      meal({ name: "B", type: "Dinner", timestamp: "2024-03-09T12:00:00.000Z" }),
    );
    service.create(
      userId,
      meal({ name: "C", type: "Dinner", timestamp: "2024-03-10T12:00:00.000Z" }),
    );

    const page = service.findAll(userId, {
      type: "Dinner",
      from: "2024-03-09T00:00:00.000Z",
      to: "2024-03-09T23:59:59.000Z",
      limit: 50,
      offset: 0,
    });

    expect(page.data.map((m) => m.name)).toEqual(["B"]);
    expect(page.total).toBe(1);
  });

  it("updates and deletes only the owner's meals", () => {
    const created = service.create(userId, meal({}));
    const other = insertTestUser(database);

    expect(() => service.update(other.id, created.id, { carbs: 1 })).toThrow(ForbiddenException);
    expect(service.update(userId, created.id, { carbs: 12, notes: "half portion" })).toMatchObject({
      carbs: 12,
      notes: "half portion",
      name: "Oatmeal",
    });
    expect(service.remove(userId, created.id)).toEqual({ deleted: true });
  });

  // -- summaries --------------------------------------------------------------

  it("sums the meals of a local calendar day", () => {
    // 2024-03-10 in New York runs from 05:00Z to 03:59:59.999Z the next day
    service.create(userId, meal({ carbs: 40, timestamp: "2024-03-10T12:00:00.000Z" }));
    service.create(userId, meal({ carbs: 20, timestamp: "2024-03-11T03:30:00.000Z" }));
    service.create(userId, meal({ carbs: 99, timestamp: "2024-03-10T04:30:00.000Z" }));

    expect(service.dailySummary(userId, "2024-03-10")).toEqual({
      date: "2024-03-10",
      mealCount: 2,
      carbs: 60,
      protein: 20,
      fat: 10,
      calories: 500,
      fiber: 8,
      sugar: 12,
      sodium: 200,
    });
  });

  it("analyzes a stored meal", () => {
    const created = service.create(userId, meal({ type: "Dinner", carbs: 50 }));
    const now = new Date("2024-03-10T20:00:00Z");

    const analysis = service.analyze(userId, created.id, now);

    expect(analysis.mealId).toBe(created.id);
    expect(analysis.analysisDate).toBe("2024-03-10T20:00:00.000Z");
    expect(analysis.recommendations.map((r) => r.title)).toEqual([
      "Reduce Carbohydrates",
      "Add More Fiber",
      "Increase Protein",
      "Consider Earlier Dinner",
    ]);
  });

  it("builds recommendations from local meal hours", () => {
    service.create(userId, meal({ carbs: 60, fiber: 5, timestamp: "2024-03-10T12:00:00.000Z" }));
    service.create(userId, meal({ carbs: 70, fiber: 5, timestamp: "2024-03-10T17:00:00.000Z" }));

    expect(service.personalizedRecommendations(userId).map((r) => r.title)).toEqual([
      "Reduce Daily Carb Intake",
      "Increase Daily Fiber",
      "Establish Regular Meal Times",
    ]);
  });
});
