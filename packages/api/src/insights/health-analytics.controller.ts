import { Controller, Get, Query, UseGuards } from "@nestjs/common";
import { JwtAuthGuard } from "../auth/jwt-auth.guard";
import { CurrentUser } from "../common/user.decorator";
import { ZodPipe } from "../common/zod.pipe";
import { insightsQueryDto } from "@glucocare/shared";
import type { InsightsQueryDto } from "@glucocare/shared";
import { HealthAnalyticsService } from "./health-analytics.service";

@Controller("insights")
@UseGuards(JwtAuthGuard)
export class HealthAnalyticsController {
  constructor(private analytics: HealthAnalyticsService) {}

  @Get("health")
  health(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(insightsQueryDto)) query: InsightsQueryDto,
  ) {
    return this.analytics.report(userId, query.days);
  }

  @Get("risk")
  risk(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(insightsQueryDto)) query: InsightsQueryDto,
  ) {
    return this.analytics.report(userId, query.days).risk;
  }
}
