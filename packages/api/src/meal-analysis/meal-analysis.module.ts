import { Module } from "@nestjs/common";
import OpenAI from "openai";
import { APP_CONFIG, type AppConfig } from "../common/config";
import { AnalysisUsageService } from "./analysis-usage.service";
import { MealAnalysisCacheService } from "./meal-analysis-cache.service";
import { MealAnalysisController } from "./meal-analysis.controller";
import { MealAnalysisService } from "./meal-analysis.service";
import { MealVisionService, OPENAI_CLIENT } from "./meal-vision.service";

@Module({
  controllers: [MealAnalysisController],
  providers: [
    {
      provide: OPENAI_CLIENT,
      inject: [APP_CONFIG],
      // SDK retries are off; MealVisionService backs off on 429 itself
      useFactory: (config: AppConfig) =>
        config.openai.apiKey ? new OpenAI({ apiKey: config.openai.apiKey, maxRetries: 0 }) : null,
    },
    MealVisionService,
    MealAnalysisCacheService,
    AnalysisUsageService,
    MealAnalysisService,
  ],
  exports: [MealAnalysisCacheService],
})
export class MealAnalysisModule {}
