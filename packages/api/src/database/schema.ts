import { randomUUID } from "crypto";
import {
  index,
  integer,
  real,
  sqliteTable,
  text,
  uniqueIndex,
} from "drizzle-orm/sqlite-core";
import type {
  DoseStatus,
  ExerciseGoalType,
  ExerciseIntensity,
  ExerciseType,
  GlucoseAlertType,
  GoalPeriod,
  HealthMetricType,
  Ingredient,
  MealAnalysisResult,
  MealType,
  MedicationColor,
  MedicationFrequency,
  MedicationShape,
  MedicationType,
} from "@glucocare/shared";

const id = () =>
  text("id")
    .primaryKey()
    .$defaultFn(() => randomUUID());

const createdAt = () =>
  integer("created_at", { mode: "timestamp_ms" })
    .notNull()
    .$defaultFn(() => new Date());

const userRef = () =>
  text("user_id")
    .notNull()
    .references(() => users.id, { onDelete: "cascade" });

// Identity

export const users = sqliteTable("users", {
  id: id(),
  email: text("email").notNull().unique(),
  password: text("password").notNull(),
  name: text("name"),
  timezone: text("timezone").notNull().default("UTC"),
  diabetesType: text("diabetes_type"),
  usesGlp1: integer("uses_glp1", { mode: "boolean" }).notNull().default(false),
  createdAt: createdAt(),
});

export const refreshTokens = sqliteTable("refresh_tokens", {
  id: id(),
  token: text("token").notNull().unique(),
  userId: userRef(),
  expiresAt: integer("expires_at", { mode: "timestamp_ms" }).notNull(),
  createdAt: createdAt(),
});

export const pushSubscriptions = sqliteTable("push_subscriptions", {
  id: id(),
  userId: userRef(),
  endpoint: text("endpoint").notNull().unique(),
  p256dh: text("p256dh").notNull(),
  auth: text("auth").notNull(),
  createdAt: createdAt(),
});

// Medications

export const medications = sqliteTable(
  "medications",
  {
    id: id(),
    userId: userRef(),
    name: text("name").notNull(),
    dosage: text("dosage").notNull(),
    frequency: text("frequency").$type<MedicationFrequency>().notNull(),
    medicationType: text("medication_type").$type<MedicationType>().notNull(),
    prescribedBy: text("prescribed_by"),
    startDate: integer("start_date", { mode: "timestamp_ms" }).notNull(),
    endDate: integer("end_date", { mode: "timestamp_ms" }),
    instructions: text("instructions"),
    sideEffects: text("side_effects", { mode: "json" }).$type<string[]>().notNull(),
    isActive: integer("is_active", { mode: "boolean" }).notNull().default(true),
    reminderEnabled: integer("reminder_enabled", { mode: "boolean" }).notNull().default(true),
    reminderTimes: text("reminder_times", { mode: "json" }).$type<string[]>().notNull(),
    color: text("color").$type<MedicationColor>().notNull(),
    shape: text("shape").$type<MedicationShape>().notNull(),
    createdAt: createdAt(),
    updatedAt: integer("updated_at", { mode: "timestamp_ms" })
      .notNull()
      .$defaultFn(() => new Date()),
  },
  (t) => ({
    userIdx: index("medications_user_idx").on(t.userId),
  }),
);

export const medicationDoses = sqliteTable(
  "medication_doses",
  {
    id: id(),
    userId: userRef(),
    medicationId: text("medication_id")
      .notNull()
      .references(() => medications.id, { onDelete: "cascade" }),
    scheduledTime: integer("scheduled_time", { mode: "timestamp_ms" }).notNull(),
    actualTime: integer("actual_time", { mode: "timestamp_ms" }),
    status: text("status").$type<DoseStatus>().notNull().default("Pending"),
    notes: text("notes"),
    sideEffectsExperienced: text("side_effects_experienced", { mode: "json" })
      .$type<string[]>()
      .notNull(),
    skippedReason: text("skipped_reason"),
  },
  (t) => ({
    slotIdx: uniqueIndex("doses_medication_slot_idx").on(t.medicationId, t.scheduledTime),
    userTimeIdx: index("doses_user_time_idx").on(t.userId, t.scheduledTime),
  }),
);

export const notificationRequests = sqliteTable(
  "notification_requests",
  {
    identifier: text("identifier").primaryKey(),
    userId: userRef(),
    medicationId: text("medication_id")
      .notNull()
      .references(() => medications.id, { onDelete: "cascade" }),
    doseId: text("dose_id").references(() => medicationDoses.id, { onDelete: "set null" }),
    kind: text("kind").$type<"reminder" | "snooze">().notNull(),
    title: text("title").notNull(),
    body: text("body").notNull(),
    category: text("category").notNull(),
    fireAt: integer("fire_at", { mode: "timestamp_ms" }).notNull(),
    deliveredAt: integer("delivered_at", { mode: "timestamp_ms" }),
    createdAt: createdAt(),
  },
  (t) => ({
    dueIdx: index("notifications_due_idx").on(t.deliveredAt, t.fireAt),
  }),
);

// Meals

export const meals = sqliteTable(
  "meals",
  {
    id: id(),
    userId: userRef(),
    name: text("name").notNull(),
    type: text("type").$type<MealType>().notNull(),
    carbs: real("carbs").notNull().default(0),
    protein: real("protein").notNull().default(0),
    fat: real("fat").notNull().default(0),
    calories: integer("calories").notNull().default(0),
    fiber: real("fiber").notNull().default(0),
    sugar: real("sugar").notNull().default(0),
    sodium: real("sodium").notNull().default(0),
    timestamp: integer("timestamp", { mode: "timestamp_ms" }).notNull(),
    notes: text("notes"),
    ingredients: text("ingredients", { mode: "json" }).$type<Ingredient[]>().notNull(),
    createdAt: createdAt(),
  },
  (t) => ({
    userTimeIdx: index("meals_user_time_idx").on(t.userId, t.timestamp),
  }),
);

export const mealAnalyses = sqliteTable(
  "meal_analyses",
  {
    id: id(),
    userId: userRef(),
    imageHash: text("image_hash").notNull(),
    result: text("result", { mode: "json" }).$type<MealAnalysisResult>().notNull(),
    sizeBytes: integer("size_bytes").notNull(),
    model: text("model").notNull(),
    tokensUsed: integer("tokens_used").notNull().default(0),
    confidence: real("confidence").notNull(),
    primaryDish: text("primary_dish").notNull(),
    totalCalories: integer("total_calories").notNull(),
    userRating: integer("user_rating"),
    userNotes: text("user_notes"),
    isFavorite: integer("is_favorite", { mode: "boolean" }).notNull().default(false),
    createdAt: createdAt(),
  },
  (t) => ({
    hashIdx: uniqueIndex("meal_analyses_user_hash_idx").on(t.userId, t.imageHash),
  }),
);

export const analysisUsage = sqliteTable("analysis_usage", {
  userId: text("user_id")
    .primaryKey()
    .references(() => users.id, { onDelete: "cascade" }),
  totalAnalyses: integer("total_analyses").notNull().default(0),
  totalTokensUsed: integer("total_tokens_used").notNull().default(0),
  averageConfidence: real("average_confidence").notNull().default(0),
  lastAnalysisDate: integer("last_analysis_date", { mode: "timestamp_ms" }),
});

export const plannedMeals = sqliteTable(
  "planned_meals",
  {
    id: id(),
    userId: userRef(),
    date: text("date").notNull(),
    mealType: text("meal_type").$type<MealType>().notNull(),
    time: text("time").notNull(),
    name: text("name").notNull(),
    description: text("description"),
    carbs: real("carbs").notNull().default(0),
    protein: real("protein").notNull().default(0),
    calories: integer("calories").notNull().default(0),
    createdAt: createdAt(),
  },
  (t) => ({
    userDateIdx: index("planned_meals_user_date_idx").on(t.userId, t.date),
  }),
);

// Glucose

export const glucoseReadings = sqliteTable(
  "glucose_readings",
  {
    id: id(),
    userId: userRef(),
    level: integer("level").notNull(),
    timestamp: integer("timestamp", { mode: "timestamp_ms" }).notNull(),
    notes: text("notes"),
    createdAt: createdAt(),
  },
  (t) => ({
    userTimeIdx: index("glucose_user_time_idx").on(t.userId, t.timestamp),
  }),
);

export const glucoseAlerts = sqliteTable("glucose_alerts", {
  id: id(),
  userId: userRef(),
  readingId: text("reading_id")
    .notNull()
    .references(() => glucoseReadings.id, { onDelete: "cascade" }),
  type: text("type").$type<GlucoseAlertType>().notNull(),
  level: integer("level").notNull(),
  timestamp: integer("timestamp", { mode: "timestamp_ms" }).notNull(),
  acknowledged: integer("acknowledged", { mode: "boolean" }).notNull().default(false),
  notes: text("notes"),
});

// Exercise

export const workouts = sqliteTable(
  "workouts",
  {
    id: id(),
    userId: userRef(),
    type: text("type").$type<ExerciseType>().notNull(),
    duration: integer("duration").notNull(),
    intensity: text("intensity").$type<ExerciseIntensity>().notNull(),
    calories: integer("calories").notNull().default(0),
    distance: real("distance"),
    timestamp: integer("timestamp", { mode: "timestamp_ms" }).notNull(),
    notes: text("notes"),
    createdAt: createdAt(),
  },
  (t) => ({
    userTimeIdx: index("workouts_user_time_idx").on(t.userId, t.timestamp),
  }),
);

export const exerciseGoals = sqliteTable("exercise_goals", {
  id: id(),
  userId: userRef(),
  type: text("type").$type<ExerciseGoalType>().notNull(),
  period: text("period").$type<GoalPeriod>().notNull(),
  target: real("target").notNull(),
  isActive: integer("is_active", { mode: "boolean" }).notNull().default(true),
  createdAt: createdAt(),
});

// Health metrics

export const healthMetrics = sqliteTable(
  "health_metrics",
  {
    id: id(),
    userId: userRef(),
    type: text("type").$type<HealthMetricType>().notNull(),
    value: real("value").notNull(),
    unit: text("unit").notNull(),
    timestamp: integer("timestamp", { mode: "timestamp_ms" }).notNull(),
  },
  (t) => ({
    userTypeIdx: index("health_metrics_user_type_idx").on(t.userId, t.type, t.timestamp),
  }),
);

export const healthGoals = sqliteTable("health_goals", {
  id: id(),
  userId: userRef(),
  metricType: text("metric_type").$type<HealthMetricType>().notNull(),
  targetValue: real("target_value").notNull(),
  unit: text("unit").notNull(),
  deadline: integer("deadline", { mode: "timestamp_ms" }),
  createdAt: createdAt(),
});

export type User = typeof users.$inferSelect;
export type Medication = typeof medications.$inferSelect;
export type NewMedication = typeof medications.$inferInsert;
export type MedicationDose = typeof medicationDoses.$inferSelect;
export type NotificationRequest = typeof notificationRequests.$inferSelect;
export type Meal = typeof meals.$inferSelect;
export type MealAnalysisRecord = typeof mealAnalyses.$inferSelect;
export type PlannedMeal = typeof plannedMeals.$inferSelect;
export type GlucoseReading = typeof glucoseReadings.$inferSelect;
export type GlucoseAlert = typeof glucoseAlerts.$inferSelect;
export type Workout = typeof workouts.$inferSelect;
export type ExerciseGoal = typeof exerciseGoals.$inferSelect;
export type HealthMetric = typeof healthMetrics.$inferSelect;
export type HealthGoal = typeof healthGoals.$inferSelect;
