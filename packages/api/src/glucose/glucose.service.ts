import { ForbiddenException, Injectable, Logger, NotFoundException } from "@nestjs/common";
import { and, asc, count, desc, eq, gte, lt, lte, type SQL } from "drizzle-orm";
import {
  GLUCOSE_ALERT_SEVERITY,
  type AcknowledgeAlertDto,
  type AlertQueryDto,
  type CreateGlucoseReadingDto,
  type GlucoseAlertResponse,
  type GlucoseInsights,
  type GlucoseQueryDto,
  type GlucoseReadingResponse,
  type GlucoseTrend,
  type PaginatedResponse,
  type UpdateGlucoseReadingDto,
} from "@glucocare/shared";
import { dayjs, localHour } from "../common/time";
import { DatabaseService } from "../database/database.service";
import { GlucoseAlert, GlucoseReading, glucoseAlerts, glucoseReadings } from "../database/schema";
import { MealsService } from "../meals/meals.service";
import { UsersService } from "../users/users.service";
import {
  RAPID_CHANGE_WINDOW_MS,
  alertsForReading,
  dawnPhenomenon,
  glucosePredictions,
  glucoseRecommendations,
  glucoseStatus,
  levelChange,
  mean,
  postMealSpikes,
  standardDeviation,
  timeInRange,
  trendDirection,
} from "./glucose-analytics";

export function toReadingResponse(reading: GlucoseReading): GlucoseReadingResponse {
  return {
    id: reading.id,
    level: reading.level,
    status: glucoseStatus(reading.level),
    timestamp: reading.timestamp.toISOString(),
    notes: reading.notes,
    createdAt: reading.createdAt.toISOString(),
  };
}

function toAlertResponse(alert: GlucoseAlert): GlucoseAlertResponse {
  return {
    id: alert.id,
    readingId: alert.readingId,
    type: alert.type,
    severity: GLUCOSE_ALERT_SEVERITY[alert.type],
    level: alert.level,
    timestamp: alert.timestamp.toISOString(),
    acknowledged: alert.acknowledged,
    notes: alert.notes,
  };
}

@Injectable()
export class GlucoseService {
  private readonly logger = new Logger(GlucoseService.name);

  constructor(
    private database: DatabaseService,
    private users: UsersService,
    private meals: MealsService,
  ) {}

  create(
    userId: string,
    dto: CreateGlucoseReadingDto,
    now = new Date(),
  ): GlucoseReadingResponse & { alerts: GlucoseAlertResponse[] } {
    const timestamp = dto.timestamp ? new Date(dto.timestamp) : now;

    return this.database.transaction(() => {
      const previous = this.database.db
        .select()
        .from(glucoseReadings)
        .where(
          and(
            eq(glucoseReadings.userId, userId),
            lt(glucoseReadings.timestamp, timestamp),
            gte(glucoseReadings.timestamp, new Date(timestamp.getTime() - RAPID_CHANGE_WINDOW_MS)),
          ),
        )
        .orderBy(desc(glucoseReadings.timestamp))
        .get();

      const reading = this.database.db
        .insert(glucoseReadings)
        .values({ userId, level: dto.level, timestamp, notes: dto.notes })
        .returning()
        .get();

      const alerts = alertsForReading(reading, previous).map((type) =>
        this.database.db
          .insert(glucoseAlerts)
          .values({ userId, readingId: reading.id, type, level: reading.level, timestamp })
          .returning()
          .get(),
      );
      if (alerts.length > 0) {
        this.logger.log(
          `Reading ${reading.level} mg/dL raised ${alerts.map((a) => a.type).join(", ")} for user ${userId}`,
        );
      }

      return { ...toReadingResponse(reading), alerts: alerts.map(toAlertResponse) };
    });
  }

  findAll(userId: string, query: GlucoseQueryDto): PaginatedResponse<GlucoseReadingResponse> {
    const conditions: SQL[] = [eq(glucoseReadings.userId, userId)];
    if (query.from) conditions.push(gte(glucoseReadings.timestamp, new Date(query.from)));
    if (query.to) conditions.push(lte(glucoseReadings.timestamp, new Date(query.to)));
    const where = and(...conditions);

    const data = this.database.db
      .select()
      .from(glucoseReadings)
      .where(where)
      .orderBy(desc(glucoseReadings.timestamp))
      .limit(query.limit)
      .offset(query.offset)
      .all();
    const total = this.database.db
      .select({ total: count() })
      .from(glucoseReadings)
      .where(where)
      .get();

    return {
      data: data.map(toReadingResponse),
      total: total?.total ?? 0,
      limit: query.limit,
      offset: query.offset,
    };
  }

  private getOwned(userId: string, id: string): GlucoseReading {
    const reading = this.database.db
      .select()
      .from(glucoseReadings)
      .where(eq(glucoseReadings.id, id))
      .get();
    if (!reading) throw new NotFoundException("Glucose reading not found");
    if (reading.userId !== userId) throw new ForbiddenException();
    return reading;
  }

  findOne(userId: string, id: string): GlucoseReadingResponse {
    return toReadingResponse(this.getOwned(userId, id));
  }

  update(userId: string, id: string, dto: UpdateGlucoseReadingDto): GlucoseReadingResponse {
    const existing = this.getOwned(userId, id);
    const updated = this.database.db
      .update(glucoseReadings)
      .set({
        level: dto.level ?? existing.level,
        timestamp: dto.timestamp ? new Date(dto.timestamp) : undefined,
        notes: dto.notes,
      })
      .where(eq(glucoseReadings.id, existing.id))
      .returning()
      .get();
    return toReadingResponse(updated);
  }

  remove(userId: string, id: string) {
    const reading = this.getOwned(userId, id);
    this.database.db.delete(glucoseReadings).where(eq(glucoseReadings.id, reading.id)).run();
    return { deleted: true };
  }

  /** Readings in [from, to], oldest first. */
  readingsBetween(userId: string, from: Date, to: Date): GlucoseReading[] {
    return this.database.db
      .select()
      .from(glucoseReadings)
      .where(
        and(
          eq(glucoseReadings.userId, userId),
          gte(glucoseReadings.timestamp, from),
          lte(glucoseReadings.timestamp, to),
        ),
      )
      .orderBy(asc(glucoseReadings.timestamp))
      .all();
  }

  // -- alerts -------------------------------------------------------------------

  alerts(userId: string, query: AlertQueryDto): GlucoseAlertResponse[] {
    const conditions: SQL[] = [eq(glucoseAlerts.userId, userId)];
    if (query.unacknowledged) conditions.push(eq(glucoseAlerts.acknowledged, false));

    return this.database.db
      .select()
      .from(glucoseAlerts)
      .where(and(...conditions))
      .orderBy(desc(glucoseAlerts.timestamp))
      .all()
      .map(toAlertResponse);
  }

  acknowledge(userId: string, id: string, dto: AcknowledgeAlertDto): GlucoseAlertResponse {
    const alert = this.database.db
      .select()
      .from(glucoseAlerts)
      .where(eq(glucoseAlerts.id, id))
      .get();
    if (!alert) throw new NotFoundException("Alert not found");
    if (alert.userId !== userId) throw new ForbiddenException();

    const updated = this.database.db
      .update(glucoseAlerts)
      .set({ acknowledged: true, notes: dto.notes ?? alert.notes })
      .where(eq(glucoseAlerts.id, id))
      .returning()
      .get();
    return toAlertResponse(updated);
  }

  // -- analytics ----------------------------------------------------------------

  insights(userId: string, days: number, now = new Date()): GlucoseInsights {
    const from = dayjs.utc(now).subtract(days, "day").toDate();
    const readings = this.readingsBetween(userId, from, now);
    const levels = readings.map((r) => r.level);

    if (readings.length === 0) {
      return {
        averageLevel: 0,
        timeInRange: 0,
        timeBelowRange: 0,
        timeAboveRange: 0,
        readingCount: 0,
        patterns: [],
        predictions: [],
        recommendations: [],
      };
    }

    const tz = this.users.getTimezone(userId);
    const averageLevel = mean(levels);
    const range = timeInRange(levels);
    const dawn = dawnPhenomenon(
      readings.map((r) => ({ level: r.level, hour: localHour(r.timestamp, tz) })),
    );

    return {
      averageLevel,
      timeInRange: range.inRange,
      timeBelowRange: range.belowRange,
      timeAboveRange: range.aboveRange,
      readingCount: readings.length,
      patterns: [
        ...(dawn ? [dawn] : []),
        ...postMealSpikes(this.meals.mealsBetween(userId, from, now), readings),
      ],
      predictions: glucosePredictions(levels),
      recommendations: glucoseRecommendations(averageLevel, range.inRange),
    };
  }

  trend(userId: string, from: Date, to: Date): GlucoseTrend {
    const levels = this.readingsBetween(userId, from, to).map((r) => r.level);
    return {
      from: from.toISOString(),
      to: to.toISOString(),
      average: mean(levels),
      direction: trendDirection(levelChange(levels)),
      variability: standardDeviation(levels),
      timeInRange: timeInRange(levels).inRange,
      readingCount: levels.length,
    };
  }
}
