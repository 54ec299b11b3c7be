import { Body, Controller, Delete, Get, Param, Post, Query, UseGuards } from "@nestjs/common";
import { JwtAuthGuard } from "../auth/jwt-auth.guard";
import { CurrentUser } from "../common/user.decorator";
import { ZodPipe } from "../common/zod.pipe";
import {
  addPlannedMealDto,
  mealPlanQueryDto,
  mealSuggestionQueryDto,
  shoppingListQueryDto,
} from "@glucocare/shared";
import type {
  AddPlannedMealDto,
  MealPlanQueryDto,
  MealSuggestionQueryDto,
  ShoppingListQueryDto,
} from "@glucocare/shared";
import { mealSuggestions } from "./meal-planning";
import { MealPlanningService } from "./meal-planning.service";

@Controller("meal-plans")
@UseGuards(JwtAuthGuard)
export class MealPlanningController {
  constructor(private planning: MealPlanningService) {}

  @Get("suggestions")
  suggestions(@Query(new ZodPipe(mealSuggestionQueryDto)) query: MealSuggestionQueryDto) {
    return mealSuggestions(query.mealType, query.targetCarbs);
  }

  @Get("daily")
  daily(@Query(new ZodPipe(mealPlanQueryDto)) query: MealPlanQueryDto) {
    return this.planning.dailyPlan(query.date);
  }

  @Get("weekly")
  weekly(@Query(new ZodPipe(mealPlanQueryDto)) query: MealPlanQueryDto) {
    return this.planning.weeklyPlan(query.date);
  }

  @Get("meals")
  plannedMeals(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(mealPlanQueryDto)) query: MealPlanQueryDto,
  ) {
    return this.planning.plannedMealsFor(userId, query.date);
  }

  @Post("meals")
  addPlannedMeal(
    @CurrentUser("id") userId: string,
    @Body(new ZodPipe(addPlannedMealDto)) body: AddPlannedMealDto,
  ) {
    return this.planning.addPlannedMeal(userId, body);
  }

  @Delete("meals/:id")
  removePlannedMeal(@CurrentUser("id") userId: string, @Param("id") id: string) {
    return this.planning.removePlannedMeal(userId, id);
  }

  @Get("nutrition")
  nutrition(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(mealPlanQueryDto)) query: MealPlanQueryDto,
  ) {
    return this.planning.nutrition(userId, query.date);
  }

  @Get("shopping-list")
  shoppingList(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(shoppingListQueryDto)) query: ShoppingListQueryDto,
  ) {
    return this.planning.shoppingList(userId, query);
  }
}
