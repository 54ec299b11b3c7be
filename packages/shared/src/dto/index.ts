import { z } from "zod";
import { DIABETES_TYPES } from "../health-types";

export * from "./medication.dto";
export * from "./meal.dto";
export * from "./meal-analysis.dto";
export * from "./meal-plan.dto";
export * from "./glucose.dto";
export * from "./exercise.dto";
export * from "./health.dto";

// Auth DTOs
export const registerDto = z.object({
  email: z.string().email(),
  password: z.string().min(6),
  name: z.string().optional(),
  timezone: z.string().optional(),
});

export const loginDto = z.object({
  email: z.string().email(),
  password: z.string(),
});

export const refreshDto = z.object({
  refreshToken: z.string(),
});

export const pushSubscriptionDto = z.object({
  endpoint: z.string().url(),
  keys: z.object({
    p256dh: z.string(),
    auth: z.string(),
  }),
});

// User DTOs
export const updateUserDto = z.object({
  name: z.string().optional(),
  timezone: z.string().min(1).optional(),
  diabetesType: z.enum(DIABETES_TYPES).nullable().optional(),
  usesGlp1: z.boolean().optional(),
});

// Export DTOs
export const EXPORT_SECTIONS = [
  "glucose",
  "meals",
  "doses",
  "workouts",
  "vitals",
] as const;

export type ExportSection = (typeof EXPORT_SECTIONS)[number];

export const exportQueryDto = z.object({
  from: z.string().datetime().optional(),
  to: z.string().datetime().optional(),
  sections: z.string().optional(), // comma-separated: "glucose,meals"
});

// Inferred types
export type RegisterDto = z.infer<typeof registerDto>;
export type LoginDto = z.infer<typeof loginDto>;
export type RefreshDto = z.infer<typeof refreshDto>;
export type PushSubscriptionDto = z.infer<typeof pushSubscriptionDto>;
export type UpdateUserDto = z.infer<typeof updateUserDto>;
export type ExportQueryDto = z.infer<typeof exportQueryDto>;

// Response types
export interface AuthTokens {
  accessToken: string;
  refreshToken: string;
}

export interface UserResponse {
  id: string;
  email: string;
  name: string | null;
  timezone: string;
  diabetesType: string | null;
  usesGlp1: boolean;
  createdAt: string;
}

export interface PaginatedResponse<T> {
  data: T[];
  total: number;
  limit: number;
  offset: number;
}
