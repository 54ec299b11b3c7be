import { z } from "zod";
import type {
  GlucoseImpact,
  Ingredient,
  MealAlternative,
  MealRecommendation,
  MealType,
} from "@glucocare/shared";
import friendlyFoodsData from "./data/diabetic-friendly-foods.json";

const DIABETIC_FRIENDLY_FOODS = z.array(z.string().min(1)).parse(friendlyFoodsData);

export interface ScoredMeal {
  name: string;
  type: MealType;
  carbs: number;
  protein: number;
  fat: number;
  calories: number;
  fiber: number;
  sugar: number;
  sodium: number;
  ingredients: Ingredient[];
}

const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(max, value));

export function isDiabeticFriendly(ingredient: Pick<Ingredient, "name">): boolean {
  const name = ingredient.name.toLowerCase();
  return DIABETIC_FRIENDLY_FOODS.some((food) => name.includes(food));
}

const nameIncludes = (meal: ScoredMeal, ...needles: string[]) =>
  meal.ingredients.some((i) => {
    const name = i.name.toLowerCase();
    return needles.some((n) => name.includes(n));
  });

// -- scores -------------------------------------------------------------------

export function nutritionalScore(meal: ScoredMeal): number {
  let score = 50;

  if (meal.protein >= 20) score += 15;
  else if (meal.protein >= 10) score += 10;

  if (meal.fiber >= 10) score += 15;
  else if (meal.fiber >= 5) score += 10;

  if (meal.carbs <= 30) score += 10;
  else if (meal.carbs <= 45) score += 5;
  else if (meal.carbs > 60) score -= 10;

  if (meal.sugar <= 10) score += 10;
  else if (meal.sugar > 25) score -= 15;

  if (meal.sodium <= 600) score += 5;
  else if (meal.sodium > 1200) score -= 10;

  score += new Set(meal.ingredients.map((i) => i.category)).size * 2;

  return clamp(score, 0, 100);
}

export function diabeticFriendliness(meal: ScoredMeal): number {
  let score = 50;

  if (meal.carbs <= 20) score += 20;
  else if (meal.carbs <= 30) score += 15;
  else if (meal.carbs <= 45) score += 10;
  else score -= 15;

  if (meal.fiber >= 8) score += 15;
  else if (meal.fiber >= 5) score += 10;

  if (meal.protein >= 15) score += 15;
  else if (meal.protein >= 10) score += 10;

  if (meal.sugar <= 5) score += 15;
  else if (meal.sugar <= 10) score += 10;
  else if (meal.sugar > 20) score -= 20;

  if (meal.fat >= 5 && meal.fat <= 15) score += 10;

  score += meal.ingredients.filter(isDiabeticFriendly).length * 3;

  return clamp(score, 0, 100);
}

// -- advice -------------------------------------------------------------------

export function mealRecommendations(meal: ScoredMeal): MealRecommendation[] {
  const recommendations: MealRecommendation[] = [];

  if (meal.carbs > 45) {
    recommendations.push({
      type: "Nutrition",
      title: "Reduce Carbohydrates",
      description: "Consider reducing carbs to under 45g per meal for better glucose control",
      priority: "High",
      actionable: true,
      estimatedBenefit: "May reduce post-meal glucose spike by 20-30mg/dL",
    });
  }

  if (meal.fiber < 5) {
    recommendations.push({
      type: "Nutrition",
      title: "Add More Fiber",
      description: "Include more vegetables or whole grains to increase fiber content",
      priority: "Medium",
      actionable: true,
      estimatedBenefit: "Fiber helps slow glucose absorption and improves satiety",
    });
  }

  if (meal.protein < 15) {
    recommendations.push({
      type: "Nutrition",
      title: "Increase Protein",
      description: "Add lean protein to help with glucose control and satiety",
      priority: "Medium",
      actionable: true,
      estimatedBenefit: "Protein helps stabilize blood sugar and reduces hunger",
    });
  }

  if (meal.type === "Dinner" && meal.carbs > 30) {
    recommendations.push({
      type: "Meal Timing",
      title: "Consider Earlier Dinner",
      description: "Eating dinner earlier may help with overnight glucose control",
      priority: "Low",
      actionable: true,
      estimatedBenefit: "May improve morning glucose levels",
    });
  }

  if (meal.calories > 600) {
    recommendations.push({
      type: "Portion Size",
      title: "Consider Smaller Portions",
      description: "Large meals can cause bigger glucose spikes",
      priority: "Medium",
      actionable: true,
      estimatedBenefit: "Smaller portions lead to more stable glucose levels",
    });
  }

  return recommendations;
}

export function mealImprovements(meal: ScoredMeal): string[] {
  const improvements: string[] = [];

  if (meal.carbs > 45) improvements.push("Replace refined grains with whole grains or vegetables");
  if (meal.fiber < 5) improvements.push("Add a side salad or steamed vegetables");
  if (meal.protein < 15) improvements.push("Include lean protein like chicken, fish, or tofu");
  if (meal.sugar > 15) improvements.push("Reduce added sugars and choose fresh fruits over dried");
  if (meal.sodium > 800) improvements.push("Use herbs and spices instead of salt for flavoring");

  const vegetables = meal.ingredients.filter((i) => i.category === "Vegetables").length;
  if (vegetables < 2) {
    improvements.push("Add more non-starchy vegetables for nutrients and fiber");
  }

  return improvements;
}

// -- alternatives -------------------------------------------------------------

function alternativeFrom(
  meal: ScoredMeal,
  suffix: string,
  notes: string,
  ingredients: Ingredient[],
): MealAlternative {
  const sum = (pick: (i: Ingredient) => number) => ingredients.reduce((t, i) => t + pick(i), 0);
  return {
    name: `${meal.name} (${suffix})`,
    type: meal.type,
    carbs: sum((i) => i.carbs),
    protein: sum((i) => i.protein),
    fat: sum((i) => i.fat),
    calories: Math.trunc(sum((i) => i.calories)),
    fiber: sum((i) => i.fiber),
    sugar: 0,
    sodium: 0,
    ingredients,
    notes,
  };
}

export function mealAlternatives(meal: ScoredMeal): MealAlternative[] {
  const alternatives: MealAlternative[] = [];

  if (meal.carbs > 30) {
    alternatives.push(
      alternativeFrom(
        meal,
        "Low Carb",
        "Lower carb alternative",
        meal.ingredients.map((i): Ingredient =>
          i.category === "Grains"
            ? {
                ...i,
                name: "Cauliflower Rice",
                calories: i.calories * 0.3,
                carbs: i.carbs * 0.2,
                fiber: i.fiber * 1.5,
                category: "Vegetables",
              }
            : i,
        ),
      ),
    );
  }

  if (meal.protein < 20) {
    alternatives.push(
      alternativeFrom(meal, "High Protein", "Higher protein alternative", [
        ...meal.ingredients,
        {
          name: "Greek Yogurt",
          amount: 100,
          unit: "g",
          calories: 100,
          carbs: 6,
          protein: 17,
          fat: 0,
          fiber: 0,
          category: "Dairy",
        },
      ]),
    );
  }

  alternatives.push(
    alternativeFrom(
      meal,
      "Plant-Based",
      "Plant-based alternative",
      meal.ingredients.map((i): Ingredient =>
        i.category === "Protein" && i.name.toLowerCase().includes("chicken")
          ? {
              ...i,
              name: "Tofu",
              calories: i.calories * 0.8,
              carbs: i.carbs + 2,
              protein: i.protein * 0.9,
              fat: i.fat * 1.2,
              fiber: i.fiber + 1,
            }
          : i,
      ),
    ),
  );

  return alternatives;
}

// -- glucose impact -----------------------------------------------------------

function timeToSpike(meal: ScoredMeal): number {
  let minutes = 60;
  if (meal.fiber > 5) minutes += 15;
  if (meal.fat > 10) minutes += 10;
  if (meal.protein > 15) minutes += 10;
  if (nameIncludes(meal, "juice", "smoothie")) minutes -= 15;
  return clamp(minutes, 30, 120);
}

function spikeDuration(meal: ScoredMeal): number {
  let minutes = 120;
  if (meal.carbs > 45) minutes += 30;
  if (meal.fat > 15) minutes += 20;
  if (meal.fiber > 8) minutes -= 15;
  return clamp(minutes, 90, 180);
}

function predictionConfidence(meal: ScoredMeal): number {
  let confidence = 0.7;

  if (meal.ingredients.length <= 5) confidence += 0.1;
  else if (meal.ingredients.length > 10) confidence -= 0.1;

  confidence += meal.ingredients.filter(isDiabeticFriendly).length * 0.02;

  // carbs / 0 kcal is never inside the balanced band
  const carbRatio = (meal.carbs / meal.calories) * 100;
  if (carbRatio >= 40 && carbRatio <= 60) confidence += 0.05;

  return clamp(confidence, 0.3, 0.95);
}

function glucoseFactors(meal: ScoredMeal): string[] {
  const factors: string[] = [];
  if (meal.carbs > 30) factors.push("High carbohydrate content");
  if (meal.fiber > 5) factors.push("High fiber content (reduces spike)");
  if (meal.protein > 15) factors.push("High protein content (slows absorption)");
  if (meal.fat > 10) factors.push("Fat content (slows absorption)");
  if (meal.sugar > 10) factors.push("Added sugars (faster absorption)");
  if (nameIncludes(meal, "white", "refined")) {
    factors.push("Refined carbohydrates (faster absorption)");
  }
  return factors;
}

export function predictGlucoseImpact(meal: ScoredMeal): GlucoseImpact {
  const netCarbs = Math.max(
    0,
    meal.carbs - meal.fiber * 0.6 - meal.protein * 0.15 - meal.fat * 0.1,
  );

  return {
    predictedSpike: netCarbs * 2.8,
    timeToSpike: timeToSpike(meal),
    duration: spikeDuration(meal),
    confidence: predictionConfidence(meal),
    factors: glucoseFactors(meal),
  };
}

// -- history ------------------------------------------------------------------

const HISTORY_WINDOW = 30;

/**
 * Recommendations from the most recent meals. `mealHours` are the local hours
 * of the same meals, in the same order.
 */
export function personalizedRecommendations(
  history: Pick<ScoredMeal, "carbs" | "fiber">[],
  mealHours: number[],
): MealRecommendation[] {
  const recent = history.slice(-HISTORY_WINDOW);
  const hours = mealHours.slice(-HISTORY_WINDOW);
  const recommendations: MealRecommendation[] = [];

  const averageCarbs =
    recent.length > 0 ? recent.reduce((t, m) => t + m.carbs, 0) / recent.length : 0;
  const fiberIntake = recent.reduce((t, m) => t + m.fiber, 0);

  if (averageCarbs > 50) {
    recommendations.push({
      type: "Nutrition",
      title: "Reduce Daily Carb Intake",
      description: `Your average carb intake is ${Math.trunc(averageCarbs)}g per meal. Consider reducing to 30-45g.`,
      priority: "High",
      actionable: true,
      estimatedBenefit: "Could improve overall glucose control",
    });
  }

  if (fiberIntake < 25) {
    recommendations.push({
      type: "Nutrition",
      title: "Increase Daily Fiber",
      description: "Aim for 25-35g of fiber daily to help with glucose control.",
      priority: "Medium",
      actionable: true,
      estimatedBenefit: "Better glucose stability and digestive health",
    });
  }

  if (variance(hours) > 2) {
    recommendations.push({
      type: "Meal Timing",
      title: "Establish Regular Meal Times",
      description: "Consistent meal timing helps with glucose predictability.",
      priority: "Medium",
      actionable: true,
      estimatedBenefit: "More stable glucose patterns throughout the day",
    });
  }

  return recommendations;
}

/** Population variance; 0 for an empty list. */
export function variance(values: number[]): number {
  if (values.length === 0) return 0;
  const mean = values.reduce((t, v) => t + v, 0) / values.length;
  return values.reduce((t, v) => t + (v - mean) ** 2, 0) / values.length;
}
