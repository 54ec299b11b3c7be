import { z } from "zod";

// Schema of the JSON the vision model returns

const macroDetail = z.object({
  grams: z.number(),
  percentage: z.number(),
});

const glycemicValue = z.object({
  value: z.number(),
  category: z.string(),
  reasoning: z.string().optional(),
});

export const mealAnalysisResultSchema = z.object({
  mealIdentification: z.object({
    primaryDishes: z.array(z.string()),
    ingredients: z.array(z.string()),
    cookingMethods: z.array(z.string()),
    estimatedPortionSizes: z.record(z.string()),
    preparationNotes: z.string().optional(),
  }),
  nutritionalAnalysis: z.object({
    totalCalories: z.number(),
    macronutrients: z.object({
      carbohydrates: macroDetail,
      protein: macroDetail,
      fat: macroDetail,
      fiber: z.object({ grams: z.number() }),
    }),
    micronutrients: z.object({
      sodium: z.string(),
      potassium: z.string(),
      calcium: z.string(),
      iron: z.string(),
      vitaminC: z.string(),
      vitaminD: z.string().optional(),
      magnesium: z.string().optional(),
    }),
    sugar: z.object({
      total: z.string(),
      added: z.string(),
      natural: z.string(),
    }),
    cholesterol: z.string().optional(),
    saturatedFat: z.string().optional(),
    transFat: z.string().optional(),
  }),
  diabeticAnalysis: z.object({
    glycemicIndex: glycemicValue,
    glycemicLoad: glycemicValue,
    estimatedBloodSugarImpact: z.object({
      peakTime: z.string(),
      expectedRise: z.string(),
      duration: z.string(),
      factors: z.array(z.string()).optional(),
    }),
    carbQuality: z.object({
      complexCarbs: z.string(),
      simpleCarbs: z.string(),
      fiberRatio: z.string(),
      netCarbs: z.string().optional(),
    }),
    insulinResponse: z
      .object({
        estimated: z.string(),
        timing: z.string(),
        factors: z.array(z.string()),
      })
      .optional(),
  }),
  glp1Considerations: z.object({
    gastroparesis: z.object({
      risk: z.string(),
      reasoning: z.string(),
      recommendations: z.array(z.string()).optional(),
    }),
    satietyFactor: z.object({
      score: z.number(),
      reasoning: z.string(),
      duration: z.string().optional(),
    }),
    digestionTime: z.object({
      estimated: z.string(),
      impact: z.string(),
      considerations: z.array(z.string()).optional(),
    }),
    nausea: z
      .object({
        risk: z.string(),
        factors: z.array(z.string()),
      })
      .optional(),
    recommendations: z.array(z.string()),
  }),
  healthScore: z.object({
    overall: z.number(),
    diabeticFriendly: z.number(),
    glp1Compatible: z.number(),
    nutritionalDensity: z.number().optional(),
    reasoning: z.string(),
  }),
  recommendations: z.object({
    portionAdjustments: z.array(z.string()),
    timingAdvice: z.array(z.string()),
    modifications: z.array(z.string()),
    bloodSugarManagement: z.array(z.string()),
    medicationTiming: z.array(z.string()).optional(),
  }),
  warnings: z.array(z.string()),
  confidence: z.number(),
  analysisNotes: z.string().optional(),
});

export type MealAnalysisResult = z.infer<typeof mealAnalysisResultSchema>;

export const analysisFeedbackDto = z.object({
  userRating: z.number().int().min(1).max(5).nullable().optional(),
  userNotes: z.string().max(1000).nullable().optional(),
  isFavorite: z.boolean().optional(),
});

export const analysisHistoryQueryDto = z.object({
  favorites: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export type AnalysisFeedbackDto = z.infer<typeof analysisFeedbackDto>;
export type AnalysisHistoryQueryDto = z.infer<typeof analysisHistoryQueryDto>;

export interface MealPhotoAnalysisResponse {
  id: string;
  timestamp: string;
  apiVersion: string;
  tokensUsed: number;
  cached: boolean;
  result: MealAnalysisResult;
  userRating: number | null;
  userNotes: string | null;
  isFavorite: boolean;
}

export interface MealAnalysisHistoryItem {
  id: string;
  createdAt: string;
  primaryDish: string;
  totalCalories: number;
  confidence: number;
  diabeticScore: number;
  glp1Score: number;
  userRating: number | null;
  isFavorite: boolean;
}

export interface MealAnalysisStatistics {
  totalAnalyses: number;
  averageConfidence: number;
  averageCalories: number;
  averageDiabeticScore: number;
  averageGlp1Score: number;
  averageCarbs: number;
  averageProtein: number;
  averageFat: number;
  averageFiber: number;
  mostCommonDishes: string[];
}

export interface AnalysisUsageResponse {
  totalAnalyses: number;
  totalTokensUsed: number;
  averageConfidence: number;
  lastAnalysisDate: string | null;
  estimatedCost: number;
}
