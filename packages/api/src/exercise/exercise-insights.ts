import {
  EXERCISE_INTENSITIES,
  EXERCISE_INTENSITY_DESCRIPTIONS,
  EXERCISE_TYPES,
  EXERCISE_TYPE_CATEGORY,
  type ExerciseCategory,
  type ExerciseGoalType,
  type ExerciseInsight,
  type ExerciseIntensity,
  type ExerciseType,
  type GoalPeriod,
} from "@glucocare/shared";

/** WHO guideline: 150 minutes of moderate activity per week. */
export const WEEKLY_GOAL_MINUTES = 150;

export const GOAL_UNITS: Record<ExerciseGoalType, string> = {
  Duration: "min",
  Frequency: "workouts",
  Calories: "kcal",
  Distance: "mi",
};

export const GOAL_PERIOD_UNIT: Record<GoalPeriod, "day" | "week" | "month" | "year"> = {
  Daily: "day",
  Weekly: "week",
  Monthly: "month",
  Yearly: "year",
};

/** Workout types with their category and intensities with a pacing hint. */
export function exerciseCatalogue(): {
  types: { type: ExerciseType; category: ExerciseCategory }[];
  intensities: { intensity: ExerciseIntensity; description: string }[];
} {
  return {
    types: EXERCISE_TYPES.map((type) => ({ type, category: EXERCISE_TYPE_CATEGORY[type] })),
    intensities: EXERCISE_INTENSITIES.map((intensity) => ({
      intensity,
      description: EXERCISE_INTENSITY_DESCRIPTIONS[intensity],
    })),
  };
}

function progressMessage(percentage: number): string {
  if (percentage >= 100) return "Excellent! You've exceeded your weekly exercise goal.";
  if (percentage >= 75) return "Great progress! You're almost at your weekly goal.";
  if (percentage >= 50) return "Good start! Keep going to reach your weekly goal.";
  if (percentage > 0) return "You've started exercising this week. Keep it up!";
  return "Start exercising to see your weekly progress.";
}

function benefitMessage(weeklyMinutes: number): string {
  if (weeklyMinutes >= 150) {
    return "Excellent! Regular exercise helps improve insulin sensitivity and blood sugar control.";
  }
  if (weeklyMinutes >= 75) {
    return "Good exercise routine! This helps with glucose metabolism and cardiovascular health.";
  }
  if (weeklyMinutes > 0) {
    return "Any exercise is beneficial for diabetes management. Try to increase gradually.";
  }
  return "Regular exercise is crucial for diabetes management. Start with light activities.";
}

function recommendationMessage(weeklyMinutes: number, weeklyGoal: number): string {
  const remaining = Math.max(0, weeklyGoal - weeklyMinutes);
  if (remaining === 0) {
    return "You've met your weekly goal! Consider adding strength training twice a week.";
  }
  if (remaining <= 30) return `Just ${remaining} more minutes to reach your weekly goal!`;
  const sessions = Math.ceil(remaining / 30);
  return `Try ${sessions} more 30-minute sessions this week to reach your goal.`;
}

export function exerciseInsights(
  weeklyMinutes: number,
  weeklyGoal = WEEKLY_GOAL_MINUTES,
): ExerciseInsight[] {
  return [
    {
      type: "progress",
      title: "Weekly Progress",
      message: progressMessage((weeklyMinutes / weeklyGoal) * 100),
    },
    { type: "benefit", title: "Diabetes Benefits", message: benefitMessage(weeklyMinutes) },
    {
      type: "recommendation",
      title: "Recommendation",
      message: recommendationMessage(weeklyMinutes, weeklyGoal),
    },
  ];
}

/** Fraction of the target reached, capped at 1; 0 for a zero target. */
export function goalProgress(current: number, target: number): number {
  if (target <= 0) return 0;
  return Math.min(current / target, 1);
}

export interface WorkoutLike {
  type: ExerciseType;
  intensity: ExerciseIntensity;
  duration: number;
  calories: number;
  distance: number | null;
}

export function goalCurrentValue(type: ExerciseGoalType, workouts: WorkoutLike[]): number {
  switch (type) {
    case "Duration":
      return workouts.reduce((sum, w) => sum + w.duration, 0);
    case "Frequency":
      return workouts.length;
    case "Calories":
      return workouts.reduce((sum, w) => sum + w.calories, 0);
    case "Distance":
      return workouts.reduce((sum, w) => sum + (w.distance ?? 0), 0);
  }
}

/** Most frequent value; ties go to the value seen first. */
export function mostFrequent<T>(values: T[]): T | null {
  const counts = new Map<T, number>();
  for (const value of values) counts.set(value, (counts.get(value) ?? 0) + 1);

  let best: T | null = null;
  let bestCount = 0;
  for (const [value, n] of counts) {
    if (n > bestCount) {
      best = value;
      bestCount = n;
    }
  }
  return best;
}
