import { z } from "zod";
import { GLYCEMIC_INDEX_LEVELS, MEAL_TYPES, SHOPPING_CATEGORIES } from "../health-types";

const dateOnly = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

export const mealSuggestionQueryDto = z.object({
  mealType: z.enum(MEAL_TYPES).default("Lunch"),
  targetCarbs: z.coerce.number().min(0).optional(),
});

export const mealPlanQueryDto = z.object({
  date: dateOnly,
});

export const addPlannedMealDto = z.object({
  date: dateOnly,
  mealType: z.enum(MEAL_TYPES).default("Lunch"),
  time: z.string().regex(/^\d{2}:\d{2}$/).optional(),
  recommendedMeal: z.string().min(1).optional(),
  name: z.string().min(1).max(200).optional(),
  description: z.string().max(1000).optional(),
  carbs: z.number().min(0).optional(),
  protein: z.number().min(0).optional(),
  calories: z.number().int().min(0).optional(),
}).refine((v) => v.recommendedMeal !== undefined || v.name !== undefined, {
  message: "Either recommendedMeal or name is required",
  path: ["name"],
});

export const shoppingListQueryDto = z.object({
  from: dateOnly,
  to: dateOnly,
});

export type MealSuggestionQueryDto = z.infer<typeof mealSuggestionQueryDto>;
export type MealPlanQueryDto = z.infer<typeof mealPlanQueryDto>;
export type AddPlannedMealDto = z.infer<typeof addPlannedMealDto>;
export type ShoppingListQueryDto = z.infer<typeof shoppingListQueryDto>;

export interface RecommendedMeal {
  name: string;
  description: string;
  carbs: number;
  protein: number;
  calories: number;
  diabetesFriendly: boolean;
  glycemicIndex: (typeof GLYCEMIC_INDEX_LEVELS)[number];
}

export interface PlanSlot {
  mealType: (typeof MEAL_TYPES)[number];
  time: string;
  targetCarbs: number;
  meal: RecommendedMeal | null;
}

export interface DailyMealPlan {
  date: string;
  carbsTarget: number;
  slots: PlanSlot[];
}

export interface PlannedMealResponse {
  id: string;
  date: string;
  mealType: string;
  time: string;
  name: string;
  description: string | null;
  carbs: number;
  protein: number;
  calories: number;
  predictedGlucoseImpact: number;
  createdAt: string;
}

export interface PlannedNutrition {
  date: string;
  totalCarbs: number;
  totalProtein: number;
  totalCalories: number;
  predictedGlucoseImpact: number;
  targets: { carbs: number; protein: number; calories: number };
}

export interface ShoppingListItem {
  name: string;
  quantity: number;
  unit: string;
  category: (typeof SHOPPING_CATEGORIES)[number];
}
