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
import { MealsService } from "./meals.service";
import { JwtAuthGuard } from "../auth/jwt-auth.guard";
import { CurrentUser } from "../common/user.decorator";
import { ZodPipe } from "../common/zod.pipe";
import {
  createMealDto,
  dailySummaryQueryDto,
  mealQueryDto,
  updateMealDto,
} from "@glucocare/shared";
import type {
  CreateMealDto,
  DailySummaryQueryDto,
  MealQueryDto,
  UpdateMealDto,
} from "@glucocare/shared";

@Controller("meals")
@UseGuards(JwtAuthGuard)
export class MealsController {
  constructor(private meals: MealsService) {}

  @Post()
  create(
    @CurrentUser("id") userId: string,
    @Body(new ZodPipe(createMealDto)) body: CreateMealDto,
  ) {
    return this.meals.create(userId, body);
  }

  @Get()
  findAll(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(mealQueryDto)) query: MealQueryDto,
  ) {
    return this.meals.findAll(userId, query);
  }

  @Get("summary")
  dailySummary(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(dailySummaryQueryDto)) query: DailySummaryQueryDto,
  ) {
    return this.meals.dailySummary(userId, query.date);
  }

  @Get("recommendations")
  recommendations(@CurrentUser("id") userId: string) {
    return this.meals.personalizedRecommendations(userId);
  }

  @Get(":id")
  findOne(@CurrentUser("id") userId: string, @Param("id") id: string) {
    return this.meals.findOne(userId, id);
  }

  @Get(":id/analysis")
  analyze(@CurrentUser("id") userId: string, @Param("id") id: string) {
    return this.meals.analyze(userId, id);
  }

  @Patch(":id")
  update(
    @CurrentUser("id") userId: string,
    @Param("id") id: string,
    @Body(new ZodPipe(updateMealDto)) body: UpdateMealDto,
  ) {
    return this.meals.update(userId, id, body);
  }

  @Delete(":id")
  remove(@CurrentUser("id") userId: string, @Param("id") id: string) {
    return this.meals.remove(userId, id);
  }
}
