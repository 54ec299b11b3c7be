import { ForbiddenException, Injectable, NotFoundException } from "@nestjs/common";
import { and, asc, count, desc, eq, gte, lte, type SQL } from "drizzle-orm";
import type {
  CreateMealDto,
  DailyNutritionSummary,
  MealAnalysisResponse,
  MealQueryDto,
  MealRecommendation,
  MealResponse,
  PaginatedResponse,
  UpdateMealDto,
} from "@glucocare/shared";
import { atLocalTime, endOfLocalDay, localHour } from "../common/time";
import { DatabaseService } from "../database/database.service";
import { Meal, meals } from "../database/schema";
import { UsersService } from "../users/users.service";
import {
  diabeticFriendliness,
  mealAlternatives,
  mealImprovements,
  mealRecommendations,
  nutritionalScore,
  personalizedRecommendations,
  predictGlucoseImpact,
} from "./meal-scoring";

export function toMealResponse(meal: Meal): MealResponse {
  return {
    id: meal.id,
    name: meal.name,
    type: meal.type,
    carbs: meal.carbs,
    protein: meal.protein,
    fat: meal.fat,
    calories: meal.calories,
    fiber: meal.fiber,
    sugar: meal.sugar,
    sodium: meal.sodium,
    timestamp: meal.timestamp.toISOString(),
    notes: meal.notes,
    ingredients: meal.ingredients,
    createdAt: meal.createdAt.toISOString(),
  };
}

const RECENT_MEALS = 30;

@Injectable()
export class MealsService {
  constructor(
    private database: DatabaseService,
    private users: UsersService,
  ) {}

  create(userId: string, dto: CreateMealDto, now = new Date()): MealResponse {
    const meal = this.database.db
      .insert(meals)
      .values({
        userId,
        name: dto.name,
        type: dto.type,
        carbs: dto.carbs,
        protein: dto.protein,
        fat: dto.fat,
        calories: dto.calories,
        fiber: dto.fiber,
        sugar: dto.sugar,
        sodium: dto.sodium,
        timestamp: dto.timestamp ? new Date(dto.timestamp) : now,
        notes: dto.notes,
        ingredients: dto.ingredients,
      })
      .returning()
      .get();
    return toMealResponse(meal);
  }

  findAll(userId: string, query: MealQueryDto): PaginatedResponse<MealResponse> {
    const conditions: SQL[] = [eq(meals.userId, userId)];
    if (query.type) conditions.push(eq(meals.type, query.type));
    if (query.from) conditions.push(gte(meals.timestamp, new Date(query.from)));
    if (query.to) conditions.push(lte(meals.timestamp, new Date(query.to)));
    const where = and(...conditions);

    const data = this.database.db
      .select()
      .from(meals)
      .where(where)
      .orderBy(desc(meals.timestamp))
      .limit(query.limit)
      .offset(query.offset)
      .all();
    const total = this.database.db.select({ total: count() }).from(meals).where(where).get();

    return {
      data: data.map(toMealResponse),
      total: total?.total ?? 0,
      limit: query.limit,
      offset: query.offset,
    };
  }

  getOwned(userId: string, id: string): Meal {
    const meal = this.database.db.select().from(meals).where(eq(meals.id, id)).get();
    if (!meal) throw new NotFoundException("Meal not found");
    if (meal.userId !== userId) throw new ForbiddenException();
    return meal;
  }

  findOne(userId: string, id: string): MealResponse {
    return toMealResponse(this.getOwned(userId, id));
  }

  update(userId: string, id: string, dto: UpdateMealDto): MealResponse {
    const existing = this.getOwned(userId, id);
    const updated = this.database.db
      .update(meals)
      .set({
        name: dto.name ?? existing.name,
        type: dto.type,
        carbs: dto.carbs,
        protein: dto.protein,
        fat: dto.fat,
        calories: dto.calories,
        fiber: dto.fiber,
        sugar: dto.sugar,
        sodium: dto.sodium,
        timestamp: dto.timestamp ? new Date(dto.timestamp) : undefined,
        notes: dto.notes,
        ingredients: dto.ingredients,
      })
      .where(eq(meals.id, existing.id))
      .returning()
      .get();
    return toMealResponse(updated);
  }

  remove(userId: string, id: string) {
    const meal = this.getOwned(userId, id);
    this.database.db.delete(meals).where(eq(meals.id, meal.id)).run();
    return { deleted: true };
  }

  /** Meals of one local calendar day, oldest first. */
  mealsOn(userId: string, date: string): Meal[] {
    const tz = this.users.getTimezone(userId);
    const start = atLocalTime(date, "00:00", tz);
    return this.database.db
      .select()
      .from(meals)
      .where(
        and(
          eq(meals.userId, userId),
          gte(meals.timestamp, start),
          lte(meals.timestamp, endOfLocalDay(start, tz)),
        ),
      )
      .orderBy(asc(meals.timestamp))
      .all();
  }

  /** Meals in [from, to], oldest first. */
  mealsBetween(userId: string, from: Date, to: Date): Meal[] {
    return this.database.db
      .select()
      .from(meals)
      .where(and(eq(meals.userId, userId), gte(meals.timestamp, from), lte(meals.timestamp, to)))
      .orderBy(asc(meals.timestamp))
      .all();
  }

  dailySummary(userId: string, date: string): DailyNutritionSummary {
    const day = this.mealsOn(userId, date);
    const sum = (pick: (m: Meal) => number) => day.reduce((t, m) => t + pick(m), 0);
    return {
      date,
      mealCount: day.length,
      carbs: sum((m) => m.carbs),
      protein: sum((m) => m.protein),
      fat: sum((m) => m.fat),
      calories: sum((m) => m.calories),
      fiber: sum((m) => m.fiber),
      sugar: sum((m) => m.sugar),
      sodium: sum((m) => m.sodium),
    };
  }

  analyze(userId: string, id: string, now = new Date()): MealAnalysisResponse {
    const meal = this.getOwned(userId, id);
    return {
      mealId: meal.id,
      analysisDate: now.toISOString(),
      nutritionalScore: nutritionalScore(meal),
      diabeticFriendliness: diabeticFriendliness(meal),
      recommendations: mealRecommendations(meal),
      improvements: mealImprovements(meal),
      alternatives: mealAlternatives(meal),
      glucoseImpactPrediction: predictGlucoseImpact(meal),
    };
  }

  personalizedRecommendations(userId: string): MealRecommendation[] {
    const tz = this.users.getTimezone(userId);
    const recent = this.database.db
      .select()
      .from(meals)
      .where(eq(meals.userId, userId))
      .orderBy(desc(meals.timestamp))
      .limit(RECENT_MEALS)
      .all()
      .reverse();

    return personalizedRecommendations(
      recent,
      recent.map((m) => localHour(m.timestamp, tz)),
    );
  }
}
