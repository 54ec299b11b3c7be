import { Injectable, Logger } from "@nestjs/common";
import type { MealPhotoAnalysisResponse } from "@glucocare/shared";
import { AnalysisUsageService } from "./analysis-usage.service";
import { MealAnalysisCacheService, toPhotoAnalysisResponse } from "./meal-analysis-cache.service";
import { imageHash, toDataUrl, validateMealImage, type UploadedImage } from "./meal-image";
import { MealVisionService } from "./meal-vision.service";

@Injectable()
export class MealAnalysisService {
  private readonly logger = new Logger(MealAnalysisService.name);

  constructor(
    private vision: MealVisionService,
    private cache: MealAnalysisCacheService,
    private usage: AnalysisUsageService,
  ) {}

  async analyzePhoto(
    userId: string,
    file: UploadedImage,
    now = new Date(),
  ): Promise<MealPhotoAnalysisResponse> {
    validateMealImage(file);
    const hash = imageHash(file.buffer);

    const cached = this.cache.get(userId, hash, now);
    if (cached) {
      this.logger.log(`Cache hit for user ${userId}, image ${hash.slice(0, 12)}`);
      return toPhotoAnalysisResponse(cached, true);
    }

    const analysis = await this.vision.analyzeMealImage(toDataUrl(file));
    const record = this.cache.store(userId, hash, analysis, now);
    this.usage.record(userId, analysis.tokensUsed, analysis.result.confidence, now);

    return toPhotoAnalysisResponse(record, false);
  }
}
