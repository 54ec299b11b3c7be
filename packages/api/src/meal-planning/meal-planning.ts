import { z } from "zod";
import {
  GLYCEMIC_INDEX_LEVELS,
  GLYCEMIC_INDEX_RANK,
  type DailyMealPlan,
  type MealType,
  type PlanSlot,
  type RecommendedMeal,
  type ShoppingListItem,
} from "@glucocare/shared";
import { MealPlanningError } from "../common/domain-error";
import recommendedMealsData from "./data/recommended-meals.json";

const recommendedMealSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  carbs: z.number().min(0),
  protein: z.number().min(0),
  calories: z.number().int().min(0),
  diabetesFriendly: z.boolean(),
  glycemicIndex: z.enum(GLYCEMIC_INDEX_LEVELS),
});

function loadRecommendedMeals(data: unknown): RecommendedMeal[] {
  const parsed = z.array(recommendedMealSchema).safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    throw MealPlanningError.dataLoadFailed(`${issue.path.join(".")}: ${issue.message}`);
  }
  return parsed.data;
}

export const RECOMMENDED_MEALS: readonly RecommendedMeal[] =
  loadRecommendedMeals(recommendedMealsData);

export const DAILY_TARGETS = { carbs: 150, protein: 80, calories: 1800 } as const;

export const DEFAULT_MEAL_TIMES: Record<MealType, string> = {
  Breakfast: "08:00",
  Lunch: "12:30",
  Snack: "15:00",
  Dinner: "18:00",
};

const CARB_TOLERANCE = 10;
const MAX_SUGGESTIONS = 5;

/**
 * Recommended meals near a carb target, diabetes-friendly first and then by
 * glycemic index. The meal type does not narrow the catalogue.
 */
export function mealSuggestions(
  _mealType: MealType,
  targetCarbs?: number,
  catalogue: readonly RecommendedMeal[] = RECOMMENDED_MEALS,
): RecommendedMeal[] {
  const candidates =
    targetCarbs === undefined
      ? [...catalogue]
      : catalogue.filter((m) => Math.abs(m.carbs - targetCarbs) <= CARB_TOLERANCE);

  return candidates
    .sort((a, b) => {
      if (a.diabetesFriendly !== b.diabetesFriendly) return a.diabetesFriendly ? -1 : 1;
      return GLYCEMIC_INDEX_RANK[a.glycemicIndex] - GLYCEMIC_INDEX_RANK[b.glycemicIndex];
    })
    .slice(0, MAX_SUGGESTIONS);
}

// Three meals and one snack; the snack gets half a meal's carbs
const PLAN_SLOTS: Array<{ mealType: MealType; share: number }> = [
  { mealType: "Breakfast", share: 1 },
  { mealType: "Lunch", share: 1 },
  { mealType: "Dinner", share: 1 },
  { mealType: "Snack", share: 0.5 },
];

export function dailyMealPlan(date: string, carbsTarget: number = DAILY_TARGETS.carbs): DailyMealPlan {
  const perMeal = carbsTarget / 4;
  const slots: PlanSlot[] = PLAN_SLOTS.map(({ mealType, share }) => {
    const targetCarbs = perMeal * share;
    return {
      mealType,
      time: DEFAULT_MEAL_TIMES[mealType],
      targetCarbs,
      meal: mealSuggestions(mealType, targetCarbs)[0] ?? null,
    };
  });
  return { date, carbsTarget, slots };
}

/** Rough rise in mg/dL: 3 per gram of carbs. */
export function mealGlucoseImpact(carbs: number): number {
  return Math.trunc(carbs * 3);
}

/** A day's rise, damped when carbs are spread over more than three meals. */
export function dayGlucoseImpact(meals: Array<{ carbs: number }>): number {
  const totalCarbs = meals.reduce((sum, m) => sum + m.carbs, 0);
  const timingFactor = meals.length > 3 ? 0.8 : 1;
  return Math.trunc(totalCarbs * 3 * timingFactor);
}

const SHOPPING_RULES: Array<{ keyword: string; items: ShoppingListItem[] }> = [
  {
    keyword: "chicken",
    items: [
      { name: "Chicken Breast", quantity: 1, unit: "lb", category: "Protein" },
      { name: "Mixed Greens", quantity: 1, unit: "bag", category: "Vegetables" },
    ],
  },
  {
    keyword: "salmon",
    items: [
      { name: "Salmon Fillet", quantity: 1, unit: "lb", category: "Protein" },
      { name: "Broccoli", quantity: 1, unit: "head", category: "Vegetables" },
    ],
  },
];

export function shoppingItemsFor(mealName: string): ShoppingListItem[] {
  const name = mealName.toLowerCase();
  const rule = SHOPPING_RULES.find((r) => name.includes(r.keyword));
  return rule ? rule.items.map((item) => ({ ...item })) : [];
}

/** Ingredients of the given meals, merged by item name and sorted by category. */
export function shoppingList(mealNames: string[]): ShoppingListItem[] {
  const items = new Map<string, ShoppingListItem>();
  for (const item of mealNames.flatMap(shoppingItemsFor)) {
    const existing = items.get(item.name);
    items.set(item.name, existing ? { ...item, quantity: existing.quantity + item.quantity } : item);
  }
  return [...items.values()].sort((a, b) => a.category.localeCompare(b.category));
}
