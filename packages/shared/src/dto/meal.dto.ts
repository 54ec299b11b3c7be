import { z } from "zod";
import {
  INGREDIENT_CATEGORIES,
  MEAL_TYPES,
  PRIORITIES,
  RECOMMENDATION_TYPES,
} from "../health-types";

export const ingredientSchema = z.object({
  name: z.string().min(1).max(100),
  amount: z.number().min(0),
  unit: z.string().max(20),
  calories: z.number().min(0),
  carbs: z.number().min(0),
  protein: z.number().min(0),
  fat: z.number().min(0),
  fiber: z.number().min(0),
  category: z.enum(INGREDIENT_CATEGORIES).default("Other"),
});

export const createMealDto = z.object({
  name: z.string().min(1).max(200),
  type: z.enum(MEAL_TYPES),
  carbs: z.number().min(0).default(0),
  protein: z.number().min(0).default(0),
  fat: z.number().min(0).default(0),
  calories: z.number().int().min(0).default(0),
  fiber: z.number().min(0).default(0),
  sugar: z.number().min(0).default(0),
  sodium: z.number().min(0).default(0),
  timestamp: z.string().datetime().optional(),
  notes: z.string().max(1000).optional(),
  ingredients: z.array(ingredientSchema).max(100).default([]),
});

export const updateMealDto = z.object({
  name: z.string().min(1).max(200).optional(),
  type: z.enum(MEAL_TYPES).optional(),
  carbs: z.number().min(0).optional(),
  protein: z.number().min(0).optional(),
  fat: z.number().min(0).optional(),
  calories: z.number().int().min(0).optional(),
  fiber: z.number().min(0).optional(),
  sugar: z.number().min(0).optional(),
  sodium: z.number().min(0).optional(),
  timestamp: z.string().datetime().optional(),
  notes: z.string().max(1000).nullable().optional(),
  ingredients: z.array(ingredientSchema).max(100).optional(),
});

export const mealQueryDto = z.object({
  from: z.string().datetime().optional(),
  to: z.string().datetime().optional(),
  type: z.enum(MEAL_TYPES).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

export const dailySummaryQueryDto = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
});

export type Ingredient = z.infer<typeof ingredientSchema>;
export type CreateMealDto = z.infer<typeof createMealDto>;
export type UpdateMealDto = z.infer<typeof updateMealDto>;
export type MealQueryDto = z.infer<typeof mealQueryDto>;
export type DailySummaryQueryDto = z.infer<typeof dailySummaryQueryDto>;

export interface MealResponse {
  id: string;
  name: string;
  type: string;
  carbs: number;
  protein: number;
  fat: number;
  calories: number;
  fiber: number;
  sugar: number;
  sodium: number;
  timestamp: string;
  notes: string | null;
  ingredients: Ingredient[];
  createdAt: string;
}

export interface GlucoseImpact {
  predictedSpike: number;
  timeToSpike: number;
  duration: number;
  confidence: number;
  factors: string[];
}

export interface MealRecommendation {
  type: (typeof RECOMMENDATION_TYPES)[number];
  title: string;
  description: string;
  priority: (typeof PRIORITIES)[number];
  actionable: boolean;
  estimatedBenefit: string;
}

export interface MealAlternative {
  name: string;
  type: (typeof MEAL_TYPES)[number];
  carbs: number;
  protein: number;
  fat: number;
  calories: number;
  fiber: number;
  sugar: number;
  sodium: number;
  ingredients: Ingredient[];
  notes: string;
}

export interface MealAnalysisResponse {
  mealId: string;
  analysisDate: string;
  nutritionalScore: number;
  diabeticFriendliness: number;
  recommendations: MealRecommendation[];
  improvements: string[];
  alternatives: MealAlternative[];
  glucoseImpactPrediction: GlucoseImpact;
}

export interface DailyNutritionSummary {
  date: string;
  mealCount: number;
  carbs: number;
  protein: number;
  fat: number;
  calories: number;
  fiber: number;
  sugar: number;
  sodium: number;
}
