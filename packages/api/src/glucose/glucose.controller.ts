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
  acknowledgeAlertDto,
  alertQueryDto,
  createGlucoseReadingDto,
  glucoseQueryDto,
  insightsQueryDto,
  trendQueryDto,
  updateGlucoseReadingDto,
} from "@glucocare/shared";
import type {
  AcknowledgeAlertDto,
  AlertQueryDto,
  CreateGlucoseReadingDto,
  GlucoseQueryDto,
  InsightsQueryDto,
  TrendQueryDto,
  UpdateGlucoseReadingDto,
} from "@glucocare/shared";
import { GlucoseService } from "./glucose.service";

@Controller("glucose")
@UseGuards(JwtAuthGuard)
export class GlucoseController {
  constructor(private glucose: GlucoseService) {}

  @Post("readings")
  create(
    @CurrentUser("id") userId: string,
    @Body(new ZodPipe(createGlucoseReadingDto)) body: CreateGlucoseReadingDto,
  ) {
    return this.glucose.create(userId, body);
  }

  @Get("readings")
  findAll(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(glucoseQueryDto)) query: GlucoseQueryDto,
  ) {
    return this.glucose.findAll(userId, query);
  }

  @Get("readings/:id")
  findOne(@CurrentUser("id") userId: string, @Param("id") id: string) {
    return this.glucose.findOne(userId, id);
  }

  @Patch("readings/:id")
  update(
    @CurrentUser("id") userId: string,
    @Param("id") id: string,
    @Body(new ZodPipe(updateGlucoseReadingDto)) body: UpdateGlucoseReadingDto,
  ) {
    return this.glucose.update(userId, id, body);
  }

  @Delete("readings/:id")
  remove(@CurrentUser("id") userId: string, @Param("id") id: string) {
    return this.glucose.remove(userId, id);
  }

  @Get("alerts")
  alerts(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(alertQueryDto)) query: AlertQueryDto,
  ) {
    return this.glucose.alerts(userId, query);
  }

  @Post("alerts/:id/acknowledge")
  acknowledge(
    @CurrentUser("id") userId: string,
    @Param("id") id: string,
    @Body(new ZodPipe(acknowledgeAlertDto)) body: AcknowledgeAlertDto,
  ) {
    return this.glucose.acknowledge(userId, id, body);
  }

  @Get("insights")
  insights(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(insightsQueryDto)) query: InsightsQueryDto,
  ) {
    return this.glucose.insights(userId, query.days);
  }

  @Get("trend")
  trend(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(trendQueryDto)) query: TrendQueryDto,
  ) {
    return this.glucose.trend(userId, new Date(query.from), new Date(query.to));
  }
}
