import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  Patch,
  Post,
  Query,
  UseGuards,
} from "@nestjs/common";
import { JwtAuthGuard } from "../auth/jwt-auth.guard";
import { CurrentUser } from "../common/user.decorator";
import { ZodPipe } from "../common/zod.pipe";
import {
  createHealthGoalDto,
  metricQueryDto,
  saveHealthMetricsDto,
  updateHealthGoalDto,
} from "@glucocare/shared";
import type {
  CreateHealthGoalDto,
  MetricQueryDto,
  SaveHealthMetricsDto,
  UpdateHealthGoalDto,
} from "@glucocare/shared";
import { HealthMetricsService } from "./health-metrics.service";

@Controller("health")
@UseGuards(JwtAuthGuard)
export class HealthMetricsController {
  constructor(private health: HealthMetricsService) {}

  @Post("metrics")
  save(
    @CurrentUser("id") userId: string,
    @Body(new ZodPipe(saveHealthMetricsDto)) body: SaveHealthMetricsDto,
  ) {
    return this.health.save(userId, body);
  }

  @Get("metrics")
  findRecent(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(metricQueryDto)) query: MetricQueryDto,
  ) {
    return this.health.findRecent(userId, query);
  }

  @Delete("metrics/:id")
  remove(@CurrentUser("id") userId: string, @Param("id") id: string) {
    return this.health.remove(userId, id);
  }

  @Get("insights")
  insights(@CurrentUser("id") userId: string) {
    return this.health.insights(userId);
  }

  @Get("goals")
  goals(@CurrentUser("id") userId: string) {
    return this.health.goals(userId);
  }

  @Post("goals")
  createGoal(
    @CurrentUser("id") userId: string,
    @Body(new ZodPipe(createHealthGoalDto)) body: CreateHealthGoalDto,
  ) {
    return this.health.createGoal(userId, body);
  }

  @Patch("goals/:id")
  updateGoal(
    @CurrentUser("id") userId: string,
    @Param("id") id: string,
    @Body(new ZodPipe(updateHealthGoalDto)) body: UpdateHealthGoalDto,
  ) {
    return this.health.updateGoal(userId, id, body);
  }

  @Delete("goals/:id")
  removeGoal(@CurrentUser("id") userId: string, @Param("id") id: string) {
    return this.health.removeGoal(userId, id);
  }
}
