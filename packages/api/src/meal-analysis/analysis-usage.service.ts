import { Injectable } from "@nestjs/common";
import { eq } from "drizzle-orm";
import type { AnalysisUsageResponse } from "@glucocare/shared";
import { DatabaseService } from "../database/database.service";
import { analysisUsage } from "../database/schema";

// Rough per-request price of a vision call, in USD
export const COST_PER_ANALYSIS = 0.02;

@Injectable()
export class AnalysisUsageService {
  constructor(private database: DatabaseService) {}

  /** Counts a fresh (uncached) analysis against the user's totals. */
  record(userId: string, tokensUsed: number, confidence: number, now = new Date()) {
    this.database.transaction(() => {
      const current = this.database.db
        .select()
        .from(analysisUsage)
        .where(eq(analysisUsage.userId, userId))
        .get();

      const previousCount = current?.totalAnalyses ?? 0;
      const totalAnalyses = previousCount + 1;
      const averageConfidence =
        ((current?.averageConfidence ?? 0) * previousCount + confidence) / totalAnalyses;
      const values = {
        totalAnalyses,
        totalTokensUsed: (current?.totalTokensUsed ?? 0) + tokensUsed,
        averageConfidence,
        lastAnalysisDate: now,
      };

      this.database.db
        .insert(analysisUsage)
        .values({ userId, ...values })
        .onConflictDoUpdate({ target: analysisUsage.userId, set: values })
        .run();
    });
  }

  getUsage(userId: string): AnalysisUsageResponse {
    const usage = this.database.db
      .select()
      .from(analysisUsage)
      .where(eq(analysisUsage.userId, userId))
      .get();

    const totalAnalyses = usage?.totalAnalyses ?? 0;
    return {
      totalAnalyses,
      totalTokensUsed: usage?.totalTokensUsed ?? 0,
      averageConfidence: usage?.averageConfidence ?? 0,
      lastAnalysisDate: usage?.lastAnalysisDate?.toISOString() ?? null,
      estimatedCost: totalAnalyses * COST_PER_ANALYSIS,
    };
  }
}
