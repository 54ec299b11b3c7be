// Medications

export const MEDICATION_FREQUENCIES = [
  "Once Daily",
  "Twice Daily",
  "Three Times Daily",
  "Four Times Daily",
  "Every Other Day",
  "Weekly",
  "As Needed",
  "Custom",
] as const;

export type MedicationFrequency = (typeof MEDICATION_FREQUENCIES)[number];

export const MEDICATION_TYPES = [
  "Insulin",
  "Metformin",
  "Blood Pressure",
  "Cholesterol",
  "Supplement",
  "Vitamin",
  "Antibiotic",
  "Pain Relief",
  "Other",
] as const;

export type MedicationType = (typeof MEDICATION_TYPES)[number];

export const MEDICATION_COLORS = [
  "Red",
  "Blue",
  "Green",
  "Yellow",
  "Orange",
  "Purple",
  "Pink",
  "White",
] as const;

export type MedicationColor = (typeof MEDICATION_COLORS)[number];

export const MEDICATION_SHAPES = ["Round", "Oval", "Square", "Capsule"] as const;

export type MedicationShape = (typeof MEDICATION_SHAPES)[number];

export const DOSE_STATUSES = ["Pending", "Taken", "Skipped"] as const;

export type DoseStatus = (typeof DOSE_STATUSES)[number];

export const ADHERENCE_PERIODS = ["week", "month", "quarter", "year"] as const;

export type AdherencePeriod = (typeof ADHERENCE_PERIODS)[number];

export const ADHERENCE_PERIOD_LABELS: Record<AdherencePeriod, string> = {
  week: "This Week",
  month: "This Month",
  quarter: "3 Months",
  year: "This Year",
};

export const NOTIFICATION_ACTIONS = [
  "DOSE_TAKEN",
  "DOSE_SKIP",
  "DOSE_SNOOZE",
] as const;

export type NotificationAction = (typeof NOTIFICATION_ACTIONS)[number];

export const NOTIFICATION_ACTION_CONFIG: Record<
  NotificationAction,
  { title: string; destructive: boolean }
> = {
  DOSE_TAKEN: { title: "Mark as Taken", destructive: false },
  DOSE_SKIP: { title: "Skip Dose", destructive: true },
  DOSE_SNOOZE: { title: "Remind in 15 min", destructive: false },
};

// Meals

export const MEAL_TYPES = ["Breakfast", "Lunch", "Dinner", "Snack"] as const;

export type MealType = (typeof MEAL_TYPES)[number];

export const INGREDIENT_CATEGORIES = [
  "Protein",
  "Vegetables",
  "Fruits",
  "Grains",
  "Dairy",
  "Fats & Oils",
  "Spices & Herbs",
  "Other",
] as const;

export type IngredientCategory = (typeof INGREDIENT_CATEGORIES)[number];

export const RECOMMENDATION_TYPES = [
  "Nutrition",
  "Glucose Control",
  "Meal Timing",
  "Portion Size",
  "Ingredient Substitution",
  "Preparation Method",
] as const;

export type RecommendationType = (typeof RECOMMENDATION_TYPES)[number];

export const PRIORITIES = ["Low", "Medium", "High", "Critical"] as const;

export type Priority = (typeof PRIORITIES)[number];

export const GLYCEMIC_INDEX_LEVELS = ["low", "medium", "high"] as const;

export type GlycemicIndexLevel = (typeof GLYCEMIC_INDEX_LEVELS)[number];

export const GLYCEMIC_INDEX_RANK: Record<GlycemicIndexLevel, number> = {
  low: 1,
  medium: 2,
  high: 3,
};

export const SHOPPING_CATEGORIES = [
  "Protein",
  "Vegetables",
  "Fruits",
  "Grains",
  "Dairy",
  "Pantry",
  "Other",
] as const;

export type ShoppingCategory = (typeof SHOPPING_CATEGORIES)[number];

// Glucose

export const GLUCOSE_STATUSES = ["Low", "Normal", "High"] as const;

export type GlucoseStatus = (typeof GLUCOSE_STATUSES)[number];

export const GLUCOSE_ALERT_TYPES = [
  "Low Glucose",
  "High Glucose",
  "Rapid Rise",
  "Rapid Fall",
] as const;

export type GlucoseAlertType = (typeof GLUCOSE_ALERT_TYPES)[number];

export const ALERT_SEVERITIES = ["Low", "Medium", "High", "Critical"] as const;

export type AlertSeverity = (typeof ALERT_SEVERITIES)[number];

export const GLUCOSE_ALERT_SEVERITY: Record<GlucoseAlertType, AlertSeverity> = {
  "Low Glucose": "High",
  "High Glucose": "High",
  "Rapid Rise": "Medium",
  "Rapid Fall": "Medium",
};

export const TREND_DIRECTIONS = ["Rising", "Stable", "Falling"] as const;

export type TrendDirection = (typeof TREND_DIRECTIONS)[number];

export const RISK_LEVELS = ["low", "medium", "high", "critical"] as const;

export type RiskLevel = (typeof RISK_LEVELS)[number];

// Exercise

export const EXERCISE_TYPES = [
  "Walking",
  "Running",
  "Cycling",
  "Swimming",
  "Strength Training",
  "Yoga",
  "Dancing",
  "Hiking",
  "Tennis",
  "Basketball",
  "Soccer",
  "Other",
] as const;

export type ExerciseType = (typeof EXERCISE_TYPES)[number];

export const EXERCISE_CATEGORIES = [
  "Cardio",
  "Strength",
  "Flexibility",
  "Sports",
  "Other",
] as const;

export type ExerciseCategory = (typeof EXERCISE_CATEGORIES)[number];

export const EXERCISE_TYPE_CATEGORY: Record<ExerciseType, ExerciseCategory> = {
  Walking: "Cardio",
  Running: "Cardio",
  Hiking: "Cardio",
  Cycling: "Cardio",
  Swimming: "Cardio",
  Dancing: "Cardio",
  "Strength Training": "Strength",
  Yoga: "Flexibility",
  Tennis: "Sports",
  Basketball: "Sports",
  Soccer: "Sports",
  Other: "Other",
};

export const EXERCISE_INTENSITIES = ["Light", "Moderate", "Vigorous"] as const;

export type ExerciseIntensity = (typeof EXERCISE_INTENSITIES)[number];

export const EXERCISE_INTENSITY_DESCRIPTIONS: Record<ExerciseIntensity, string> = {
  Light: "Easy pace, can hold conversation",
  Moderate: "Somewhat hard, slightly breathless",
  Vigorous: "Hard pace, difficult to talk",
};

export const EXERCISE_GOAL_TYPES = [
  "Duration",
  "Frequency",
  "Calories",
  "Distance",
] as const;

export type ExerciseGoalType = (typeof EXERCISE_GOAL_TYPES)[number];

export const GOAL_PERIODS = ["Daily", "Weekly", "Monthly", "Yearly"] as const;

export type GoalPeriod = (typeof GOAL_PERIODS)[number];

// Health metrics

export const HEALTH_METRIC_TYPES = [
  "heart_rate",
  "systolic_bp",
  "diastolic_bp",
  "weight",
  "temperature",
] as const;

export type HealthMetricType = (typeof HEALTH_METRIC_TYPES)[number];

export const HEALTH_METRIC_CONFIG: Record<
  HealthMetricType,
  { title: string; unit: string; decimals: number }
> = {
  heart_rate: { title: "Heart Rate", unit: "bpm", decimals: 0 },
  systolic_bp: { title: "Systolic BP", unit: "mmHg", decimals: 0 },
  diastolic_bp: { title: "Diastolic BP", unit: "mmHg", decimals: 0 },
  weight: { title: "Weight", unit: "lbs", decimals: 1 },
  temperature: { title: "Temperature", unit: "°F", decimals: 1 },
};

export const GOAL_STATUSES = [
  "Achieved",
  "On Track",
  "Needs Attention",
  "Off Track",
] as const;

export type GoalStatus = (typeof GOAL_STATUSES)[number];

export const DIABETES_TYPES = ["type1", "type2", "gestational", "prediabetes", "other"] as const;

export type DiabetesType = (typeof DIABETES_TYPES)[number];
