import { z } from "zod";
import {
  ADHERENCE_PERIODS,
  DOSE_STATUSES,
  MEDICATION_COLORS,
  MEDICATION_FREQUENCIES,
  MEDICATION_SHAPES,
  MEDICATION_TYPES,
  NOTIFICATION_ACTIONS,
} from "../health-types";

const timeOfDay = z.string().regex(/^\d{2}:\d{2}$/);

export const createMedicationDto = z.object({
  name: z.string().min(1).max(100),
  dosage: z.string().min(1).max(100),
  frequency: z.enum(MEDICATION_FREQUENCIES).default("Once Daily"),
  medicationType: z.enum(MEDICATION_TYPES).default("Other"),
  prescribedBy: z.string().max(100).optional(),
  startDate: z.string().datetime().optional(),
  endDate: z.string().datetime().optional(),
  instructions: z.string().max(1000).optional(),
  sideEffects: z.array(z.string().max(100)).max(50).default([]),
  isActive: z.boolean().default(true),
  reminderEnabled: z.boolean().default(true),
  reminderTimes: z.array(timeOfDay).max(24).optional(),
  color: z.enum(MEDICATION_COLORS).default("Blue"),
  shape: z.enum(MEDICATION_SHAPES).default("Round"),
});

export const updateMedicationDto = z.object({
  name: z.string().min(1).max(100).optional(),
  dosage: z.string().min(1).max(100).optional(),
  frequency: z.enum(MEDICATION_FREQUENCIES).optional(),
  medicationType: z.enum(MEDICATION_TYPES).optional(),
  prescribedBy: z.string().max(100).nullable().optional(),
  startDate: z.string().datetime().optional(),
  endDate: z.string().datetime().nullable().optional(),
  instructions: z.string().max(1000).nullable().optional(),
  sideEffects: z.array(z.string().max(100)).max(50).optional(),
  isActive: z.boolean().optional(),
  reminderEnabled: z.boolean().optional(),
  reminderTimes: z.array(timeOfDay).max(24).optional(),
  color: z.enum(MEDICATION_COLORS).optional(),
  shape: z.enum(MEDICATION_SHAPES).optional(),
});

export const medicationQueryDto = z.object({
  active: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .optional(),
});

export const markTakenDto = z.object({
  takenAt: z.string().datetime().optional(),
  notes: z.string().max(500).optional(),
  sideEffectsExperienced: z.array(z.string().max(100)).max(50).optional(),
});

export const markSkippedDto = z.object({
  reason: z.string().max(500).optional(),
});

export const snoozeDto = z.object({
  minutes: z.number().int().min(1).max(240).default(15),
});

export const calendarQueryDto = z.object({
  month: z.string().regex(/^\d{4}-\d{2}$/),
});

export const adherenceQueryDto = z.object({
  period: z.enum(ADHERENCE_PERIODS).default("week"),
});

export const notificationActionDto = z.object({
  action: z.enum(NOTIFICATION_ACTIONS),
  doseId: z.string().min(1),
});

export type CreateMedicationDto = z.infer<typeof createMedicationDto>;
export type UpdateMedicationDto = z.infer<typeof updateMedicationDto>;
export type MedicationQueryDto = z.infer<typeof medicationQueryDto>;
export type MarkTakenDto = z.infer<typeof markTakenDto>;
export type MarkSkippedDto = z.infer<typeof markSkippedDto>;
export type SnoozeDto = z.infer<typeof snoozeDto>;
export type CalendarQueryDto = z.infer<typeof calendarQueryDto>;
export type AdherenceQueryDto = z.infer<typeof adherenceQueryDto>;
export type NotificationActionDto = z.infer<typeof notificationActionDto>;

export interface MedicationResponse {
  id: string;
  name: string;
  dosage: string;
  frequency: string;
  medicationType: string;
  prescribedBy: string | null;
  startDate: string;
  endDate: string | null;
  instructions: string | null;
  sideEffects: string[];
  isActive: boolean;
  reminderEnabled: boolean;
  reminderTimes: string[];
  color: string;
  shape: string;
  nextDoseTime: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface DoseResponse {
  id: string;
  medicationId: string;
  scheduledTime: string;
  actualTime: string | null;
  status: (typeof DOSE_STATUSES)[number];
  notes: string | null;
  sideEffectsExperienced: string[];
  skippedReason: string | null;
  isOverdue: boolean;
}

export interface CalendarDayResponse {
  date: string;
  doses: DoseResponse[];
  adherenceScore: number;
  hasOverdueDoses: boolean;
  completedDoses: number;
  totalDoses: number;
}

export interface AdherenceReportResponse {
  medicationId: string;
  period: (typeof ADHERENCE_PERIODS)[number];
  periodLabel: string;
  startDate: string;
  endDate: string;
  totalDoses: number;
  takenDoses: number;
  skippedDoses: number;
  adherencePercentage: number;
  currentStreak: number;
  longestStreak: number;
}

export interface NotificationRequestResponse {
  identifier: string;
  medicationId: string;
  doseId: string | null;
  kind: string;
  title: string;
  body: string;
  category: string;
  fireAt: string;
  deliveredAt: string | null;
}
