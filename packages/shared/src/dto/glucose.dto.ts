import { z } from "zod";
import {
  ALERT_SEVERITIES,
  GLUCOSE_ALERT_TYPES,
  GLUCOSE_STATUSES,
  RISK_LEVELS,
  TREND_DIRECTIONS,
} from "../health-types";

export const createGlucoseReadingDto = z.object({
  level: z.number().int().min(10).max(1000),
  timestamp: z.string().datetime().optional(),
  notes: z.string().max(500).optional(),
});

export const updateGlucoseReadingDto = z.object({
  level: z.number().int().min(10).max(1000).optional(),
  timestamp: z.string().datetime().optional(),
  notes: z.string().max(500).nullable().optional(),
});

export const glucoseQueryDto = z.object({
  from: z.string().datetime().optional(),
  to: z.string().datetime().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export const alertQueryDto = z.object({
  unacknowledged: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .optional(),
});

export const acknowledgeAlertDto = z.object({
  notes: z.string().max(500).optional(),
});

export const insightsQueryDto = z.object({
  days: z.coerce.number().int().min(1).max(365).default(30),
});

export const trendQueryDto = z.object({
  from: z.string().datetime(),
  to: z.string().datetime(),
});

export type CreateGlucoseReadingDto = z.infer<typeof createGlucoseReadingDto>;
export type UpdateGlucoseReadingDto = z.infer<typeof updateGlucoseReadingDto>;
export type GlucoseQueryDto = z.infer<typeof glucoseQueryDto>;
export type AlertQueryDto = z.infer<typeof alertQueryDto>;
export type AcknowledgeAlertDto = z.infer<typeof acknowledgeAlertDto>;
export type InsightsQueryDto = z.infer<typeof insightsQueryDto>;
export type TrendQueryDto = z.infer<typeof trendQueryDto>;

export interface GlucoseReadingResponse {
  id: string;
  level: number;
  status: (typeof GLUCOSE_STATUSES)[number];
  timestamp: string;
  notes: string | null;
  createdAt: string;
}

export interface GlucoseAlertResponse {
  id: string;
  readingId: string;
  type: (typeof GLUCOSE_ALERT_TYPES)[number];
  severity: (typeof ALERT_SEVERITIES)[number];
  level: number;
  timestamp: string;
  acknowledged: boolean;
  notes: string | null;
}

export interface GlucosePattern {
  type: "dawn_phenomenon" | "post_meal_spike";
  description: string;
  confidence: number;
}

export interface GlucosePrediction {
  description: string;
  timeframe: string;
  confidence: number;
}

export interface HealthRecommendation {
  title: string;
  description: string;
  priority: "low" | "medium" | "high";
  category: string;
}

export interface GlucoseInsights {
  averageLevel: number;
  timeInRange: number;
  timeBelowRange: number;
  timeAboveRange: number;
  readingCount: number;
  patterns: GlucosePattern[];
  predictions: GlucosePrediction[];
  recommendations: HealthRecommendation[];
}

export interface GlucoseTrend {
  from: string;
  to: string;
  average: number;
  direction: (typeof TREND_DIRECTIONS)[number];
  variability: number;
  timeInRange: number;
  readingCount: number;
}

export interface ExerciseImpactInsight {
  averageImprovement: number;
  workoutsAnalyzed: number;
  recommendations: HealthRecommendation[];
}

export interface NutritionPatternInsight {
  highCarbMeals: number;
  recommendations: HealthRecommendation[];
}

export interface RiskFactor {
  description: string;
  severity: (typeof RISK_LEVELS)[number];
}

export interface RiskAssessment {
  overallRisk: (typeof RISK_LEVELS)[number];
  variability: number;
  averageLevel: number;
  factors: RiskFactor[];
  recommendations: string[];
}

export interface HealthReport {
  windowDays: number;
  exerciseImpact: ExerciseImpactInsight;
  nutrition: NutritionPatternInsight;
  risk: RiskAssessment;
  recommendations: HealthRecommendation[];
}
