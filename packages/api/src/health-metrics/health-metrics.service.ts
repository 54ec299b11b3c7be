import { ForbiddenException, Injectable, Logger, NotFoundException } from "@nestjs/common";
import { and, asc, desc, eq } from "drizzle-orm";
import {
  HEALTH_METRIC_CONFIG,
  type CreateHealthGoalDto,
  type HealthGoalResponse,
  type HealthInsights,
  type HealthMetricResponse,
  type MetricQueryDto,
  type SaveHealthMetricsDto,
  type UpdateHealthGoalDto,
} from "@glucocare/shared";
import { HealthError, describeError } from "../common/domain-error";
import { DatabaseService } from "../database/database.service";
import { HealthGoal, HealthMetric, healthGoals, healthMetrics } from "../database/schema";
import { ExerciseService } from "../exercise/exercise.service";
import {
  bloodPressureInsight,
  displayValue,
  goalProgressPercentage,
  goalStatus,
  heartRateInsight,
  metricValues,
  weightInsight,
} from "./health-metrics";

const RECENT_LIMIT = 20;

function toMetricResponse(metric: HealthMetric): HealthMetricResponse {
  return {
    id: metric.id,
    type: metric.type,
    title: HEALTH_METRIC_CONFIG[metric.type].title,
    value: metric.value,
    unit: metric.unit,
    displayValue: displayValue(metric.type, metric.value),
    timestamp: metric.timestamp.toISOString(),
  };
}

@Injectable()
export class HealthMetricsService {
  private readonly logger = new Logger(HealthMetricsService.name);

  constructor(
    private database: DatabaseService,
    private exercise: ExerciseService,
  ) {}

  save(userId: string, dto: SaveHealthMetricsDto, now = new Date()): HealthMetricResponse[] {
    const values = metricValues(dto);
    if (values.length === 0) throw HealthError.invalidMetrics("at least one value is required");
    const timestamp = dto.timestamp ? new Date(dto.timestamp) : now;

    const saved = this.database.transaction(() =>
      values.map(({ type, value }) =>
        this.database.db
          .insert(healthMetrics)
          .values({ userId, type, value, unit: HEALTH_METRIC_CONFIG[type].unit, timestamp })
          .returning()
          .get(),
      ),
    );

    this.logger.log(`Saved ${saved.length} health metrics for user ${userId}`);
    return saved.map(toMetricResponse);
  }

  private recent(userId: string, query: MetricQueryDto): HealthMetric[] {
    const where = query.type
      ? and(eq(healthMetrics.userId, userId), eq(healthMetrics.type, query.type))
      : eq(healthMetrics.userId, userId);

    return this.database.db
      .select()
      .from(healthMetrics)
      .where(where)
      .orderBy(desc(healthMetrics.timestamp))
      .limit(query.limit)
      .all();
  }

  findRecent(userId: string, query: MetricQueryDto): HealthMetricResponse[] {
    try {
      return this.recent(userId, query).map(toMetricResponse);
    } catch (err) {
      throw HealthError.dataLoadFailed(describeError(err));
    }
  }

  remove(userId: string, id: string) {
    const metric = this.database.db
      .select()
      .from(healthMetrics)
      .where(eq(healthMetrics.id, id))
      .get();
    if (!metric) throw new NotFoundException("Health metric not found");
    if (metric.userId !== userId) throw new ForbiddenException();

    this.database.db.delete(healthMetrics).where(eq(healthMetrics.id, id)).run();
    return { deleted: true };
  }

  insights(userId: string, now = new Date()): HealthInsights {
    const recent = this.recent(userId, { limit: RECENT_LIMIT });

    return {
      heartRate: heartRateInsight(recent),
      bloodPressure: bloodPressureInsight(recent),
      weight: weightInsight(recent),
      exercise: this.exercise
        .insights(userId, now)
        .map(({ title, message }) => ({ title, message })),
    };
  }

  // -- goals --------------------------------------------------------------------

  private toGoalResponse(goal: HealthGoal): HealthGoalResponse {
    const latest = this.recent(goal.userId, { type: goal.metricType, limit: 1 });
    const currentValue = latest.length > 0 ? latest[0].value : null;
    const progressPercentage = goalProgressPercentage(currentValue, goal.targetValue);

    return {
      id: goal.id,
      metricType: goal.metricType,
      targetValue: goal.targetValue,
      unit: goal.unit,
      deadline: goal.deadline ? goal.deadline.toISOString() : null,
      currentValue,
      progressPercentage,
      status: goalStatus(progressPercentage),
      createdAt: goal.createdAt.toISOString(),
    };
  }

  private getOwnedGoal(userId: string, id: string): HealthGoal {
    const goal = this.database.db.select().from(healthGoals).where(eq(healthGoals.id, id)).get();
    if (!goal) throw new NotFoundException("Health goal not found");
    if (goal.userId !== userId) throw new ForbiddenException();
    return goal;
  }

  goals(userId: string): HealthGoalResponse[] {
    return this.database.db
      .select()
      .from(healthGoals)
      .where(eq(healthGoals.userId, userId))
      .orderBy(asc(healthGoals.createdAt))
      .all()
      .map((goal) => this.toGoalResponse(goal));
  }

  createGoal(userId: string, dto: CreateHealthGoalDto): HealthGoalResponse {
    const goal = this.database.db
      .insert(healthGoals)
      .values({
        userId,
        metricType: dto.metricType,
        targetValue: dto.targetValue,
        unit: dto.unit ?? HEALTH_METRIC_CONFIG[dto.metricType].unit,
        deadline: dto.deadline ? new Date(dto.deadline) : null,
      })
      .returning()
      .get();
    return this.toGoalResponse(goal);
  }

  updateGoal(userId: string, id: string, dto: UpdateHealthGoalDto): HealthGoalResponse {
    const existing = this.getOwnedGoal(userId, id);
    const deadline =
      dto.deadline === undefined ? undefined : dto.deadline === null ? null : new Date(dto.deadline);

    const updated = this.database.db
      .update(healthGoals)
      .set({ targetValue: dto.targetValue ?? existing.targetValue, unit: dto.unit, deadline })
      .where(eq(healthGoals.id, existing.id))
      .returning()
      .get();
    return this.toGoalResponse(updated);
  }

  removeGoal(userId: string, id: string) {
    const goal = this.getOwnedGoal(userId, id);
    this.database.db.delete(healthGoals).where(eq(healthGoals.id, goal.id)).run();
    return { deleted: true };
  }
}
