import { z } from "zod";
import {
  EXERCISE_GOAL_TYPES,
  EXERCISE_INTENSITIES,
  EXERCISE_TYPES,
  GOAL_PERIODS,
} from "../health-types";

export const createWorkoutDto = z.object({
  type: z.enum(EXERCISE_TYPES),
  duration: z.number().int().min(1).max(1440),
  intensity: z.enum(EXERCISE_INTENSITIES).default("Moderate"),
  calories: z.number().int().min(0).default(0),
  distance: z.number().min(0).optional(),
  timestamp: z.string().datetime().optional(),
  notes: z.string().max(500).optional(),
});

export const updateWorkoutDto = z.object({
  type: z.enum(EXERCISE_TYPES).optional(),
  duration: z.number().int().min(1).max(1440).optional(),
  intensity: z.enum(EXERCISE_INTENSITIES).optional(),
  calories: z.number().int().min(0).optional(),
  distance: z.number().min(0).nullable().optional(),
  timestamp: z.string().datetime().optional(),
  notes: z.string().max(500).nullable().optional(),
});

export const workoutQueryDto = z.object({
  from: z.string().datetime().optional(),
  to: z.string().datetime().optional(),
  type: z.enum(EXERCISE_TYPES).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

export const createExerciseGoalDto = z.object({
  type: z.enum(EXERCISE_GOAL_TYPES),
  period: z.enum(GOAL_PERIODS).default("Weekly"),
  target: z.number().min(0),
  isActive: z.boolean().default(true),
});

export const updateExerciseGoalDto = z.object({
  target: z.number().min(0).optional(),
  period: z.enum(GOAL_PERIODS).optional(),
  isActive: z.boolean().optional(),
});

export const analyticsQueryDto = z.object({
  range: z.enum(["week", "month"]).default("week"),
});

export type CreateWorkoutDto = z.infer<typeof createWorkoutDto>;
export type UpdateWorkoutDto = z.infer<typeof updateWorkoutDto>;
export type WorkoutQueryDto = z.infer<typeof workoutQueryDto>;
export type CreateExerciseGoalDto = z.infer<typeof createExerciseGoalDto>;
export type UpdateExerciseGoalDto = z.infer<typeof updateExerciseGoalDto>;
export type AnalyticsQueryDto = z.infer<typeof analyticsQueryDto>;

export interface WorkoutResponse {
  id: string;
  type: string;
  category: string;
  duration: number;
  intensity: string;
  calories: number;
  distance: number | null;
  timestamp: string;
  notes: string | null;
  createdAt: string;
}

export interface ExerciseSummary {
  todayMinutes: number;
  todayCalories: number;
  todayWorkouts: number;
  weeklyMinutes: number;
  weeklyGoal: number;
}

export interface ExerciseInsight {
  type: "progress" | "benefit" | "recommendation";
  title: string;
  message: string;
}

export interface ExerciseGoalResponse {
  id: string;
  type: string;
  period: string;
  target: number;
  unit: string;
  current: number;
  progress: number;
  isActive: boolean;
  createdAt: string;
}

export interface WorkoutAnalytics {
  range: "week" | "month";
  from: string;
  to: string;
  totalWorkouts: number;
  totalDuration: number;
  totalCalories: number;
  mostFrequentType: string | null;
  mostCommonIntensity: string | null;
}
