import { ForbiddenException, Injectable, Logger, NotFoundException } from "@nestjs/common";
import { and, asc, count, desc, eq, gte, lte, type SQL } from "drizzle-orm";
import {
  EXERCISE_TYPE_CATEGORY,
  type AnalyticsQueryDto,
  type CreateExerciseGoalDto,
  type CreateWorkoutDto,
  type ExerciseGoalResponse,
  type ExerciseInsight,
  type ExerciseSummary,
  type PaginatedResponse,
  type UpdateExerciseGoalDto,
  type UpdateWorkoutDto,
  type WorkoutAnalytics,
  type WorkoutQueryDto,
  type WorkoutResponse,
} from "@glucocare/shared";
import { ExerciseError, describeError } from "../common/domain-error";
import {
  endOfLocalDay,
  endOfLocalUnit,
  startOfLocalDay,
  startOfLocalUnit,
} from "../common/time";
import { DatabaseService } from "../database/database.service";
import { ExerciseGoal, Workout, exerciseGoals, workouts } from "../database/schema";
import { UsersService } from "../users/users.service";
import {
  GOAL_PERIOD_UNIT,
  GOAL_UNITS,
  WEEKLY_GOAL_MINUTES,
  exerciseInsights,
  goalCurrentValue,
  goalProgress,
  mostFrequent,
} from "./exercise-insights";

function toWorkoutResponse(workout: Workout): WorkoutResponse {
  return {
    id: workout.id,
    type: workout.type,
    category: EXERCISE_TYPE_CATEGORY[workout.type],
    duration: workout.duration,
    intensity: workout.intensity,
    calories: workout.calories,
    distance: workout.distance,
    timestamp: workout.timestamp.toISOString(),
    notes: workout.notes,
    createdAt: workout.createdAt.toISOString(),
  };
}

@Injectable()
export class ExerciseService {
  private readonly logger = new Logger(ExerciseService.name);

  constructor(
    private database: DatabaseService,
    private users: UsersService,
  ) {}

  // -- workouts -----------------------------------------------------------------

  create(userId: string, dto: CreateWorkoutDto, now = new Date()): WorkoutResponse {
    const timestamp = dto.timestamp ? new Date(dto.timestamp) : now;
    if (timestamp.getTime() > now.getTime()) {
      throw ExerciseError.invalidWorkout("workouts cannot be logged in the future");
    }

    const workout = this.database.db
      .insert(workouts)
      .values({
        userId,
        type: dto.type,
        duration: dto.duration,
        intensity: dto.intensity,
        calories: dto.calories,
        distance: dto.distance,
        timestamp,
        notes: dto.notes,
      })
      .returning()
      .get();

    this.logger.log(`Logged ${workout.duration} min of ${workout.type} for user ${userId}`);
    return toWorkoutResponse(workout);
  }

  findAll(userId: string, query: WorkoutQueryDto): PaginatedResponse<WorkoutResponse> {
    const conditions: SQL[] = [eq(workouts.userId, userId)];
    if (query.from) conditions.push(gte(workouts.timestamp, new Date(query.from)));
    if (query.to) conditions.push(lte(workouts.timestamp, new Date(query.to)));
    if (query.type) conditions.push(eq(workouts.type, query.type));
    const where = and(...conditions);

    try {
      const data = this.database.db
        .select()
        .from(workouts)
        .where(where)
        .orderBy(desc(workouts.timestamp))
        .limit(query.limit)
        .offset(query.offset)
        .all();
      const total = this.database.db.select({ total: count() }).from(workouts).where(where).get();

      return {
        data: data.map(toWorkoutResponse),
        total: total?.total ?? 0,
        limit: query.limit,
        offset: query.offset,
      };
    } catch (err) {
      throw ExerciseError.dataLoadFailed(describeError(err));
    }
  }

  private getOwned(userId: string, id: string): Workout {
    const workout = this.database.db.select().from(workouts).where(eq(workouts.id, id)).get();
    if (!workout) throw new NotFoundException("Workout not found");
    if (workout.userId !== userId) throw new ForbiddenException();
    return workout;
  }

  findOne(userId: string, id: string): WorkoutResponse {
    return toWorkoutResponse(this.getOwned(userId, id));
  }

  update(userId: string, id: string, dto: UpdateWorkoutDto): WorkoutResponse {
    const existing = this.getOwned(userId, id);
    const updated = this.database.db
      .update(workouts)
      .set({
        type: dto.type ?? existing.type,
        duration: dto.duration,
        intensity: dto.intensity,
        calories: dto.calories,
        distance: dto.distance,
        timestamp: dto.timestamp ? new Date(dto.timestamp) : undefined,
        notes: dto.notes,
      })
      .where(eq(workouts.id, existing.id))
      .returning()
      .get();
    return toWorkoutResponse(updated);
  }

  remove(userId: string, id: string) {
    const workout = this.getOwned(userId, id);
    this.database.db.delete(workouts).where(eq(workouts.id, workout.id)).run();
    return { deleted: true };
  }

  /** Workouts in [from, to], oldest first. */
  workoutsBetween(userId: string, from: Date, to: Date): Workout[] {
    return this.database.db
      .select()
      .from(workouts)
      .where(
        and(eq(workouts.userId, userId), gte(workouts.timestamp, from), lte(workouts.timestamp, to)),
      )
      .orderBy(asc(workouts.timestamp))
      .all();
  }

  // -- summary & insights -------------------------------------------------------

  private weeklyMinutes(userId: string, tz: string, now: Date): number {
    return this.workoutsBetween(userId, startOfLocalUnit(now, "week", tz), now).reduce(
      (sum, w) => sum + w.duration,
      0,
    );
  }

  summary(userId: string, now = new Date()): ExerciseSummary {
    const tz = this.users.getTimezone(userId);
    const today = this.workoutsBetween(userId, startOfLocalDay(now, tz), endOfLocalDay(now, tz));

    return {
      todayMinutes: today.reduce((sum, w) => sum + w.duration, 0),
      todayCalories: today.reduce((sum, w) => sum + w.calories, 0),
      todayWorkouts: today.length,
      weeklyMinutes: this.weeklyMinutes(userId, tz, now),
      weeklyGoal: WEEKLY_GOAL_MINUTES,
    };
  }

  insights(userId: string, now = new Date()): ExerciseInsight[] {
    const tz = this.users.getTimezone(userId);
    return exerciseInsights(this.weeklyMinutes(userId, tz, now));
  }

  analytics(userId: string, query: AnalyticsQueryDto, now = new Date()): WorkoutAnalytics {
    const tz = this.users.getTimezone(userId);
    const from = startOfLocalUnit(now, query.range, tz);
    const to = endOfLocalUnit(now, query.range, tz);
    const range = this.workoutsBetween(userId, from, to);

    return {
      range: query.range,
      from: from.toISOString(),
      to: to.toISOString(),
      totalWorkouts: range.length,
      totalDuration: range.reduce((sum, w) => sum + w.duration, 0),
      totalCalories: range.reduce((sum, w) => sum + w.calories, 0),
      mostFrequentType: mostFrequent(range.map((w) => w.type)),
      mostCommonIntensity: mostFrequent(range.map((w) => w.intensity)),
    };
  }

  // -- goals --------------------------------------------------------------------

  private toGoalResponse(goal: ExerciseGoal, tz: string, now: Date): ExerciseGoalResponse {
    const unit = GOAL_PERIOD_UNIT[goal.period];
    const from = unit === "day" ? startOfLocalDay(now, tz) : startOfLocalUnit(now, unit, tz);
    const current = goalCurrentValue(goal.type, this.workoutsBetween(goal.userId, from, now));

    return {
      id: goal.id,
      type: goal.type,
      period: goal.period,
      target: goal.target,
      unit: GOAL_UNITS[goal.type],
      current,
      progress: goalProgress(current, goal.target),
      isActive: goal.isActive,
      createdAt: goal.createdAt.toISOString(),
    };
  }

  private getOwnedGoal(userId: string, id: string): ExerciseGoal {
    const goal = this.database.db
      .select()
      .from(exerciseGoals)
      .where(eq(exerciseGoals.id, id))
      .get();
    if (!goal) throw new NotFoundException("Exercise goal not found");
    if (goal.userId !== userId) throw new ForbiddenException();
    return goal;
  }

  goals(userId: string, now = new Date()): ExerciseGoalResponse[] {
    const tz = this.users.getTimezone(userId);
    return this.database.db
      .select()
      .from(exerciseGoals)
      .where(eq(exerciseGoals.userId, userId))
      .orderBy(asc(exerciseGoals.createdAt))
      .all()
      .map((goal) => this.toGoalResponse(goal, tz, now));
  }

  createGoal(userId: string, dto: CreateExerciseGoalDto, now = new Date()): ExerciseGoalResponse {
    const goal = this.database.db
      .insert(exerciseGoals)
      .values({ userId, ...dto })
      .returning()
      .get();
    return this.toGoalResponse(goal, this.users.getTimezone(userId), now);
  }

  updateGoal(
    userId: string,
    id: string,
    dto: UpdateExerciseGoalDto,
    now = new Date(),
  ): ExerciseGoalResponse {
    const existing = this.getOwnedGoal(userId, id);
    const updated = this.database.db
      .update(exerciseGoals)
      .set({
        target: dto.target ?? existing.target,
        period: dto.period,
        isActive: dto.isActive,
      })
      .where(eq(exerciseGoals.id, existing.id))
      .returning()
      .get();
    return this.toGoalResponse(updated, this.users.getTimezone(userId), now);
  }

  removeGoal(userId: string, id: string) {
    const goal = this.getOwnedGoal(userId, id);
    this.database.db.delete(exerciseGoals).where(eq(exerciseGoals.id, goal.id)).run();
    return { deleted: true };
  }
}
