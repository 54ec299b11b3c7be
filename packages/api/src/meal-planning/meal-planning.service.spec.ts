import { ForbiddenException, NotFoundException } from "@nestjs/common";
import { DatabaseService } from "../database/database.service";
import { createTestDatabase, insertTestUser } from "../database/testing";
import { MealPlanningService } from "./meal-planning.service";

describe("MealPlanningService", () => {
  let database: DatabaseService;
  let service: MealPlanningService;
  let userId: string;

  beforeEach(() => {
    database = createTestDatabase();
    service = new MealPlanningService(database);
    userId = insertTestUser(database).id;
  });

  afterEach(() => database.onModuleDestroy());

  it("plans a recommended meal with its defaults", () => {
    const planned = service.addPlannedMeal(userId, {
      date: "2024-03-10",
      mealType: "Lunch",
      recommendedMeal: "Quinoa Bowl",
    });

    expect(planned).toMatchObject({
      name: "Quinoa Bowl",
      description: "Quinoa with roasted vegetables and tahini dressing",
      time: "12:30",
      carbs: 45,
      protein: 12,
      calories: 380,
      predictedGlucoseImpact: 135,
    });
  });

  it("rejects unknown recommended meals", () => {
    expect(() =>
      service.addPlannedMeal(userId, {
        date: "2024-03-10",
        mealType: "Lunch",
        recommendedMeal: "Pizza",
      }),
    ).toThrow(NotFoundException);
  });

  it("lists a day's meals by time and totals their nutrition", () => {
    service.addPlannedMeal(userId, { date: "2024-03-10", mealType: "Dinner", name: "Stew", carbs: 40, protein: 30, calories: 500 });
    service.addPlannedMeal(userId, { date: "2024-03-10", mealType: "Breakfast", name: "Eggs", carbs: 5, protein: 18, calories: 250 });
    service.addPlannedMeal(userId, { date: "2024-03-11", mealType: "Lunch", name: "Soup", carbs: 30 });

    expect(service.plannedMealsFor(userId, "2024-03-10").map((m) => m.name)).toEqual([
      "Eggs",
      "Stew",
    ]);
    expect(service.nutrition(userId, "2024-03-10")).toEqual({
      date: "2024-03-10",
      totalCarbs: 45,
      totalProtein: 48,
      totalCalories: 750,
      predictedGlucoseImpact: 135,
      targets: { carbs: 150, protein: 80, calories: 1800 },
    });
  });

  it("deletes only the owner's planned meals", () => {
    const planned = service.addPlannedMeal(userId, { date: "2024-03-10", mealType: "Snack", name: "Nuts" });
    const other = insertTestUser(database);

    expect(() => service.removePlannedMeal(other.id, planned.id)).toThrow(ForbiddenException);
    expect(service.removePlannedMeal(userId, planned.id)).toEqual({ deleted: true });
    expect(service.plannedMealsFor(userId, "2024-03-10")).toEqual([]);
  });

  it("builds a shopping list over an inclusive date range", () => {
    service.addPlannedMeal(userId, { date: "2024-03-09", mealType: "Lunch", recommendedMeal: "Grilled Chicken Salad" });
    service.addPlannedMeal(userId, { date: "2024-03-10", mealType: "Lunch", recommendedMeal: "Grilled Chicken Salad" });
    service.addPlannedMeal(userId, { date: "2024-03-12", mealType: "Dinner", recommendedMeal: "Salmon with Broccoli" });

    expect(service.shoppingList(userId, { from: "2024-03-09", to: "2024-03-11" })).toEqual([
      { name: "Chicken Breast", quantity: 2, unit: "lb", category: "Protein" },
      { name: "Mixed Greens", quantity: 2, unit: "bag", category: "Vegetables" },
    ]);
  });

  it("generates seven consecutive daily plans", () => {
    const week = service.weeklyPlan("2024-02-27");
    expect(week.map((d) => d.date)).toEqual([
      "2024-02-27",
      "2024-02-28",
      "2024-02-29",
      "2024-03-01",
      "2024-03-02",
      "2024-03-03",
      "2024-03-04",
    ]);
  });
});
