import { z } from "zod";
import { GOAL_STATUSES, HEALTH_METRIC_TYPES } from "../health-types";

export const saveHealthMetricsDto = z
  .object({
    heartRate: z.number().min(20).max(250).optional(),
    systolicBP: z.number().min(50).max(260).optional(),
    diastolicBP: z.number().min(30).max(180).optional(),
    weight: z.number().min(1).max(1500).optional(),
    temperature: z.number().min(80).max(115).optional(),
    timestamp: z.string().datetime().optional(),
  })
  .refine(
    (v) =>
      v.heartRate !== undefined ||
      v.systolicBP !== undefined ||
      v.diastolicBP !== undefined ||
      v.weight !== undefined ||
      v.temperature !== undefined,
    { message: "At least one metric value is required" },
  );

export const metricQueryDto = z.object({
  type: z.enum(HEALTH_METRIC_TYPES).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const createHealthGoalDto = z.object({
  metricType: z.enum(HEALTH_METRIC_TYPES),
  targetValue: z.number().min(0),
  unit: z.string().max(20).optional(),
  deadline: z.string().datetime().optional(),
});

export const updateHealthGoalDto = z.object({
  targetValue: z.number().min(0).optional(),
  unit: z.string().max(20).optional(),
  deadline: z.string().datetime().nullable().optional(),
});

export type SaveHealthMetricsDto = z.infer<typeof saveHealthMetricsDto>;
export type MetricQueryDto = z.infer<typeof metricQueryDto>;
export type CreateHealthGoalDto = z.infer<typeof createHealthGoalDto>;
export type UpdateHealthGoalDto = z.infer<typeof updateHealthGoalDto>;

export interface HealthMetricResponse {
  id: string;
  type: (typeof HEALTH_METRIC_TYPES)[number];
  title: string;
  value: number;
  unit: string;
  displayValue: string;
  timestamp: string;
}

export interface HealthInsight {
  title: string;
  message: string;
}

export interface HealthInsights {
  heartRate: HealthInsight;
  bloodPressure: HealthInsight;
  weight: HealthInsight;
  exercise: HealthInsight[];
}

export interface HealthGoalResponse {
  id: string;
  metricType: string;
  targetValue: number;
  unit: string;
  deadline: string | null;
  currentValue: number | null;
  progressPercentage: number;
  status: (typeof GOAL_STATUSES)[number];
  createdAt: string;
}
