import { ForbiddenException, Injectable, Logger, NotFoundException } from "@nestjs/common";
import { and, asc, eq, gte, lte } from "drizzle-orm";
import type {
  AddPlannedMealDto,
  DailyMealPlan,
  PlannedMealResponse,
  PlannedNutrition,
  ShoppingListItem,
  ShoppingListQueryDto,
} from "@glucocare/shared";
import { MealPlanningError, describeError } from "../common/domain-error";
import { addDays } from "../common/time";
import { DatabaseService } from "../database/database.service";
import { PlannedMeal, plannedMeals } from "../database/schema";
import {
  DAILY_TARGETS,
  DEFAULT_MEAL_TIMES,
  RECOMMENDED_MEALS,
  dailyMealPlan,
  dayGlucoseImpact,
  mealGlucoseImpact,
  shoppingList,
} from "./meal-planning";

function toPlannedMealResponse(meal: PlannedMeal): PlannedMealResponse {
  return {
    id: meal.id,
    date: meal.date,
    mealType: meal.mealType,
    time: meal.time,
    name: meal.name,
    description: meal.description,
    carbs: meal.carbs,
    protein: meal.protein,
    calories: meal.calories,
    predictedGlucoseImpact: mealGlucoseImpact(meal.carbs),
    createdAt: meal.createdAt.toISOString(),
  };
}

@Injectable()
export class MealPlanningService {
  private readonly logger = new Logger(MealPlanningService.name);

  constructor(private database: DatabaseService) {}

  dailyPlan(date: string): DailyMealPlan {
    return dailyMealPlan(date);
  }

  weeklyPlan(from: string): DailyMealPlan[] {
    return Array.from({ length: 7 }, (_, i) => dailyMealPlan(addDays(from, i)));
  }

  addPlannedMeal(userId: string, dto: AddPlannedMealDto): PlannedMealResponse {
    const recommended =
      dto.recommendedMeal === undefined
        ? undefined
        : RECOMMENDED_MEALS.find((m) => m.name === dto.recommendedMeal);
    if (dto.recommendedMeal !== undefined && !recommended) {
      throw new NotFoundException("Recommended meal not found");
    }

    let meal: PlannedMeal;
    try {
      meal = this.database.db
        .insert(plannedMeals)
        .values({
          userId,
          date: dto.date,
          mealType: dto.mealType,
          time: dto.time ?? DEFAULT_MEAL_TIMES[dto.mealType],
          name: dto.name ?? recommended?.name ?? "Planned meal",
          description: dto.description ?? recommended?.description ?? null,
          carbs: dto.carbs ?? recommended?.carbs ?? 0,
          protein: dto.protein ?? recommended?.protein ?? 0,
          calories: dto.calories ?? recommended?.calories ?? 0,
        })
        .returning()
        .get();
    } catch (err) {
      this.logger.error(`Failed to save planned meal for user ${userId}: ${err}`);
      throw MealPlanningError.saveFailed(describeError(err));
    }

    this.logger.debug(`Planned ${meal.name} on ${meal.date} for user ${userId}`);
    return toPlannedMealResponse(meal);
  }

  private mealsOn(userId: string, from: string, to: string): PlannedMeal[] {
    return this.database.db
      .select()
      .from(plannedMeals)
      .where(
        and(
          eq(plannedMeals.userId, userId),
          gte(plannedMeals.date, from),
          lte(plannedMeals.date, to),
        ),
      )
      .orderBy(asc(plannedMeals.date), asc(plannedMeals.time))
      .all();
  }

  plannedMealsFor(userId: string, date: string): PlannedMealResponse[] {
    return this.mealsOn(userId, date, date).map(toPlannedMealResponse);
  }

  removePlannedMeal(userId: string, id: string) {
    const meal = this.database.db
      .select()
      .from(plannedMeals)
      .where(eq(plannedMeals.id, id))
      .get();
    if (!meal) throw new NotFoundException("Planned meal not found");
    if (meal.userId !== userId) throw new ForbiddenException();

    this.database.db.delete(plannedMeals).where(eq(plannedMeals.id, id)).run();
    return { deleted: true };
  }

  nutrition(userId: string, date: string): PlannedNutrition {
    const meals = this.mealsOn(userId, date, date);
    return {
      date,
      totalCarbs: meals.reduce((sum, m) => sum + m.carbs, 0),
      totalProtein: meals.reduce((sum, m) => sum + m.protein, 0),
      totalCalories: meals.reduce((sum, m) => sum + m.calories, 0),
      predictedGlucoseImpact: dayGlucoseImpact(meals),
      targets: { ...DAILY_TARGETS },
    };
  }

  shoppingList(userId: string, range: ShoppingListQueryDto): ShoppingListItem[] {
    return shoppingList(this.mealsOn(userId, range.from, range.to).map((m) => m.name));
  }
}
