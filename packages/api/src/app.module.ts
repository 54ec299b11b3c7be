import { Module } from "@nestjs/common";
import { ScheduleModule } from "@nestjs/schedule";
import { ThrottlerModule } from "@nestjs/throttler";
import { APP_FILTER } from "@nestjs/core";
import { ConfigModule } from "./common/config.module";
import { DomainExceptionFilter } from "./common/domain-exception.filter";
import { DatabaseModule } from "./database/database.module";
import { AuthModule } from "./auth/auth.module";
import { UsersModule } from "./users/users.module";
import { PushModule } from "./push/push.module";
import { MedicationsModule } from "./medications/medications.module";
import { RemindersModule } from "./reminders/reminders.module";
import { MealsModule } from "./meals/meals.module";
import { MealAnalysisModule } from "./meal-analysis/meal-analysis.module";
import { MealPlanningModule } from "./meal-planning/meal-planning.module";
import { GlucoseModule } from "./glucose/glucose.module";
import { ExerciseModule } from "./exercise/exercise.module";
import { HealthMetricsModule } from "./health-metrics/health-metrics.module";
import { InsightsModule } from "./insights/insights.module";
import { ExportModule } from "./export/export.module";

@Module({
  imports: [
    ConfigModule,
    ScheduleModule.forRoot(),
    ThrottlerModule.forRoot([{ ttl: 60_000, limit: 100 }]),
    DatabaseModule,
    AuthModule,
    UsersModule,
    PushModule,
    MedicationsModule,
    RemindersModule,
    MealsModule,
    MealAnalysisModule,
    MealPlanningModule,
    GlucoseModule,
    ExerciseModule,
    HealthMetricsModule,
    InsightsModule,
    ExportModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: DomainExceptionFilter }],
})
export class AppModule {}
