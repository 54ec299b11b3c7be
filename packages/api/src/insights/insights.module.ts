import { Module } from "@nestjs/common";
import { ExerciseModule } from "../exercise/exercise.module";
import { GlucoseModule } from "../glucose/glucose.module";
import { MealsModule } from "../meals/meals.module";
import { HealthAnalyticsController } from "./health-analytics.controller";
import { HealthAnalyticsService } from "./health-analytics.service";

@Module({
  imports: [GlucoseModule, MealsModule, ExerciseModule],
  controllers: [HealthAnalyticsController],
  providers: [HealthAnalyticsService],
})
export class InsightsModule {}
