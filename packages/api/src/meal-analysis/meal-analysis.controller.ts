import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  Param,
  Patch,
  Post,
  Query,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from "@nestjs/common";
import { FileInterceptor } from "@nestjs/platform-express";
import { Throttle, ThrottlerGuard } from "@nestjs/throttler";
import { JwtAuthGuard } from "../auth/jwt-auth.guard";
import { CurrentUser } from "../common/user.decorator";
import { ZodPipe } from "../common/zod.pipe";
import { analysisFeedbackDto, analysisHistoryQueryDto } from "@glucocare/shared";
import type { AnalysisFeedbackDto, AnalysisHistoryQueryDto } from "@glucocare/shared";
import { AnalysisUsageService } from "./analysis-usage.service";
import { MealAnalysisCacheService, toPhotoAnalysisResponse } from "./meal-analysis-cache.service";
import { MealAnalysisService } from "./meal-analysis.service";
import { MAX_IMAGE_SIZE } from "./meal-image";

@Controller("meal-analysis")
@UseGuards(JwtAuthGuard, ThrottlerGuard)
export class MealAnalysisController {
  constructor(
    private analysis: MealAnalysisService,
    private cache: MealAnalysisCacheService,
    private usage: AnalysisUsageService,
  ) {}

  @Post()
  @Throttle({ default: { limit: 10, ttl: 60_000 } })
  @UseInterceptors(FileInterceptor("file", { limits: { fileSize: MAX_IMAGE_SIZE } }))
  analyze(
    @CurrentUser("id") userId: string,
    @UploadedFile() file: Express.Multer.File | undefined,
  ) {
    if (!file) throw new BadRequestException("No image provided");
    return this.analysis.analyzePhoto(userId, file);
  }

  @Get("history")
  history(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(analysisHistoryQueryDto)) query: AnalysisHistoryQueryDto,
  ) {
    return this.cache.history(userId, query);
  }

  @Get("statistics")
  statistics(@CurrentUser("id") userId: string) {
    return this.cache.statistics(userId);
  }

  @Get("usage")
  getUsage(@CurrentUser("id") userId: string) {
    return this.usage.getUsage(userId);
  }

  @Get(":id")
  findOne(@CurrentUser("id") userId: string, @Param("id") id: string) {
    return toPhotoAnalysisResponse(this.cache.getOwned(userId, id), true);
  }

  @Patch(":id")
  feedback(
    @CurrentUser("id") userId: string,
    @Param("id") id: string,
    @Body(new ZodPipe(analysisFeedbackDto)) body: AnalysisFeedbackDto,
  ) {
    return this.cache.updateFeedback(userId, id, body);
  }

  @Delete(":id")
  remove(@CurrentUser("id") userId: string, @Param("id") id: string) {
    return this.cache.remove(userId, id);
  }

  @Delete()
  clear(@CurrentUser("id") userId: string) {
    return this.cache.clear(userId);
  }
}
