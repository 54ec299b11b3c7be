import { ForbiddenException, Injectable, Logger, NotFoundException } from "@nestjs/common";
import { Cron, CronExpression } from "@nestjs/schedule";
import { and, asc, count, desc, eq, lt, type SQL } from "drizzle-orm";
import type {
  AnalysisFeedbackDto,
  AnalysisHistoryQueryDto,
  MealAnalysisHistoryItem,
  MealAnalysisResult,
  MealAnalysisStatistics,
  MealPhotoAnalysisResponse,
  PaginatedResponse,
} from "@glucocare/shared";
import { dayjs } from "../common/time";
import { DatabaseService } from "../database/database.service";
import { MealAnalysisRecord, mealAnalyses } from "../database/schema";

export const MAX_CACHE_AGE_DAYS = 30;
export const MAX_CACHE_BYTES = 100 * 1024 * 1024; // 100 MB per user

interface SizedEntry {
  id: string;
  sizeBytes: number;
  createdAt: Date;
}

/**
 * Ids to drop, oldest first, once the total exceeds `maxBytes`; eviction
 * stops at 75 % of the maximum.
 */
export function entriesToEvict(entries: SizedEntry[], maxBytes = MAX_CACHE_BYTES): string[] {
  let total = entries.reduce((sum, e) => sum + e.sizeBytes, 0);
  if (total <= maxBytes) return [];

  const evicted: string[] = [];
  const oldestFirst = [...entries].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  for (const entry of oldestFirst) {
    evicted.push(entry.id);
    total -= entry.sizeBytes;
    if (total <= (maxBytes * 3) / 4) break;
  }
  return evicted;
}

export function toPhotoAnalysisResponse(
  record: MealAnalysisRecord,
  cached: boolean,
): MealPhotoAnalysisResponse {
  return {
    id: record.id,
    timestamp: record.createdAt.toISOString(),
    apiVersion: record.model,
    tokensUsed: record.tokensUsed,
    cached,
    result: record.result,
    userRating: record.userRating,
    userNotes: record.userNotes,
    isFavorite: record.isFavorite,
  };
}

function toHistoryItem(record: MealAnalysisRecord): MealAnalysisHistoryItem {
  return {
    id: record.id,
    createdAt: record.createdAt.toISOString(),
    primaryDish: record.primaryDish,
    totalCalories: record.totalCalories,
    confidence: record.confidence,
    diabeticScore: record.result.healthScore.diabeticFriendly,
    glp1Score: record.result.healthScore.glp1Compatible,
    userRating: record.userRating,
    isFavorite: record.isFavorite,
  };
}

const average = (values: number[]) =>
  values.length === 0 ? 0 : values.reduce((t, v) => t + v, 0) / values.length;

@Injectable()
export class MealAnalysisCacheService {
  private readonly logger = new Logger(MealAnalysisCacheService.name);

  constructor(private database: DatabaseService) {}

  private cutoff(now: Date): Date {
    return dayjs.utc(now).subtract(MAX_CACHE_AGE_DAYS, "day").toDate();
  }

  /** Cached analysis of an image, unless it has expired. */
  get(userId: string, imageHash: string, now = new Date()): MealAnalysisRecord | null {
    const record = this.database.db
      .select()
      .from(mealAnalyses)
      .where(and(eq(mealAnalyses.userId, userId), eq(mealAnalyses.imageHash, imageHash)))
      .get();
    if (!record) return null;

    if (record.createdAt.getTime() < this.cutoff(now).getTime()) {
      this.database.db.delete(mealAnalyses).where(eq(mealAnalyses.id, record.id)).run();
      return null;
    }
    return record;
  }

  store(
    userId: string,
    imageHash: string,
    analysis: { result: MealAnalysisResult; model: string; tokensUsed: number },
    now = new Date(),
  ): MealAnalysisRecord {
    const { result } = analysis;
    const entry = {
      result,
      sizeBytes: Buffer.byteLength(JSON.stringify(result), "utf8"),
      model: analysis.model,
      tokensUsed: analysis.tokensUsed,
      confidence: result.confidence,
      primaryDish: result.mealIdentification.primaryDishes[0] ?? "Unknown Meal",
      totalCalories: Math.round(result.nutritionalAnalysis.totalCalories),
      createdAt: now,
    };
    const record = this.database.db
      .insert(mealAnalyses)
      .values({ userId, imageHash, ...entry })
      .onConflictDoUpdate({
        target: [mealAnalyses.userId, mealAnalyses.imageHash],
        set: entry,
      })
      .returning()
      .get();

    this.enforceSizeLimit(userId);
    return record;
  }

  private enforceSizeLimit(userId: string) {
    const entries = this.database.db
      .select({
        id: mealAnalyses.id,
        sizeBytes: mealAnalyses.sizeBytes,
        createdAt: mealAnalyses.createdAt,
      })
      .from(mealAnalyses)
      .where(eq(mealAnalyses.userId, userId))
      .all();

    const evicted = entriesToEvict(entries);
    if (evicted.length === 0) return;

    this.database.transaction(() => {
      for (const id of evicted) {
        this.database.db.delete(mealAnalyses).where(eq(mealAnalyses.id, id)).run();
      }
    });
    this.logger.log(`Evicted ${evicted.length} cached analyses for user ${userId}`);
  }

  @Cron(CronExpression.EVERY_DAY_AT_4AM)
  purgeExpired(now = new Date()): number {
    const removed = this.database.db
      .delete(mealAnalyses)
      .where(lt(mealAnalyses.createdAt, this.cutoff(now)))
      .run().changes;
    if (removed > 0) this.logger.log(`Purged ${removed} expired meal analyses`);
    return removed;
  }

  getOwned(userId: string, id: string): MealAnalysisRecord {
    const record = this.database.db
      .select()
      .from(mealAnalyses)
      .where(eq(mealAnalyses.id, id))
      .get();
    if (!record) throw new NotFoundException("Analysis not found");
    if (record.userId !== userId) throw new ForbiddenException();
    return record;
  }

  history(
    userId: string,
    query: AnalysisHistoryQueryDto,
  ): PaginatedResponse<MealAnalysisHistoryItem> {
    const conditions: SQL[] = [eq(mealAnalyses.userId, userId)];
    if (query.favorites !== undefined) {
      conditions.push(eq(mealAnalyses.isFavorite, query.favorites));
    }
    const where = and(...conditions);

    const data = this.database.db
      .select()
      .from(mealAnalyses)
      .where(where)
      .orderBy(desc(mealAnalyses.createdAt))
      .limit(query.limit)
      .offset(query.offset)
      .all();
    const total = this.database.db
      .select({ total: count() })
      .from(mealAnalyses)
      .where(where)
      .get();

    return {
      data: data.map(toHistoryItem),
      total: total?.total ?? 0,
      limit: query.limit,
      offset: query.offset,
    };
  }

  statistics(userId: string): MealAnalysisStatistics {
    const results = this.database.db
      .select({ result: mealAnalyses.result })
      .from(mealAnalyses)
      .where(eq(mealAnalyses.userId, userId))
      .orderBy(asc(mealAnalyses.createdAt))
      .all()
      .map((r) => r.result);

    const dishCounts = new Map<string, number>();
    for (const dish of results.flatMap((r) => r.mealIdentification.primaryDishes)) {
      dishCounts.set(dish, (dishCounts.get(dish) ?? 0) + 1);
    }
    // Stable sort keeps first-seen order between equal counts
    const mostCommonDishes = [...dishCounts.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, 5)
      .map(([dish]) => dish);

    const macros = results.map((r) => r.nutritionalAnalysis.macronutrients);
    return {
      totalAnalyses: results.length,
      averageConfidence: average(results.map((r) => r.confidence)),
      averageCalories: average(results.map((r) => r.nutritionalAnalysis.totalCalories)),
      averageDiabeticScore: average(results.map((r) => r.healthScore.diabeticFriendly)),
      averageGlp1Score: average(results.map((r) => r.healthScore.glp1Compatible)),
      averageCarbs: average(macros.map((m) => m.carbohydrates.grams)),
      averageProtein: average(macros.map((m) => m.protein.grams)),
      averageFat: average(macros.map((m) => m.fat.grams)),
      averageFiber: average(macros.map((m) => m.fiber.grams)),
      mostCommonDishes,
    };
  }

  updateFeedback(userId: string, id: string, dto: AnalysisFeedbackDto): MealPhotoAnalysisResponse {
    const record = this.getOwned(userId, id);
    if (dto.userRating === undefined && dto.userNotes === undefined && dto.isFavorite === undefined) {
      return toPhotoAnalysisResponse(record, true);
    }

    const updated = this.database.db
      .update(mealAnalyses)
      .set({ userRating: dto.userRating, userNotes: dto.userNotes, isFavorite: dto.isFavorite })
      .where(eq(mealAnalyses.id, record.id))
      .returning()
      .get();
    return toPhotoAnalysisResponse(updated, true);
  }

  remove(userId: string, id: string) {
    const record = this.getOwned(userId, id);
    this.database.db.delete(mealAnalyses).where(eq(mealAnalyses.id, record.id)).run();
    return { deleted: true };
  }

  clear(userId: string) {
    const removed = this.database.db
      .delete(mealAnalyses)
      .where(eq(mealAnalyses.userId, userId))
      .run().changes;
    return { deleted: removed };
  }
}
