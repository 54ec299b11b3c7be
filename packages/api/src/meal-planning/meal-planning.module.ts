import { Module } from "@nestjs/common";
import { MealPlanningController } from "./meal-planning.controller";
import { MealPlanningService } from "./meal-planning.service";

@Module({
  controllers: [MealPlanningController],
  providers: [MealPlanningService],
})
export class MealPlanningModule {}
