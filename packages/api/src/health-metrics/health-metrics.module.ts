import { Module } from "@nestjs/common";
import { ExerciseModule } from "../exercise/exercise.module";
import { HealthMetricsController } from "./health-metrics.controller";
import { HealthMetricsService } from "./health-metrics.service";

@Module({
  imports: [ExerciseModule],
  controllers: [HealthMetricsController],
  providers: [HealthMetricsService],
})
export class HealthMetricsModule {}
