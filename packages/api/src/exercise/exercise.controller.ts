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
  analyticsQueryDto,
  createExerciseGoalDto,
  createWorkoutDto,
  updateExerciseGoalDto,
  updateWorkoutDto,
  workoutQueryDto,
} from "@glucocare/shared";
import type {
  AnalyticsQueryDto,
  CreateExerciseGoalDto,
  CreateWorkoutDto,
  UpdateExerciseGoalDto,
  UpdateWorkoutDto,
  WorkoutQueryDto,
} from "@glucocare/shared";
import { exerciseCatalogue } from "./exercise-insights";
import { ExerciseService } from "./exercise.service";

@Controller("exercise")
@UseGuards(JwtAuthGuard)
export class ExerciseController {
  constructor(private exercise: ExerciseService) {}

  @Get("types")
  types() {
    return exerciseCatalogue();
  }

  @Post("workouts")
  create(
    @CurrentUser("id") userId: string,
    @Body(new ZodPipe(createWorkoutDto)) body: CreateWorkoutDto,
  ) {
    return this.exercise.create(userId, body);
  }

  @Get("workouts")
  findAll(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(workoutQueryDto)) query: WorkoutQueryDto,
  ) {
    return this.exercise.findAll(userId, query);
  }

  @Get("workouts/:id")
  findOne(@CurrentUser("id") userId: string, @Param("id") id: string) {
    return this.exercise.findOne(userId, id);
  }

  @Patch("workouts/:id")
  update(
    @CurrentUser("id") userId: string,
    @Param("id") id: string,
    @Body(new ZodPipe(updateWorkoutDto)) body: UpdateWorkoutDto,
  ) {
    return this.exercise.update(userId, id, body);
  }

  @Delete("workouts/:id")
  remove(@CurrentUser("id") userId: string, @Param("id") id: string) {
    return this.exercise.remove(userId, id);
  }

  @Get("summary")
  summary(@CurrentUser("id") userId: string) {
    return this.exercise.summary(userId);
  }

  @Get("insights")
  insights(@CurrentUser("id") userId: string) {
    return this.exercise.insights(userId);
  }

  @Get("analytics")
  analytics(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(analyticsQueryDto)) query: AnalyticsQueryDto,
  ) {
    return this.exercise.analytics(userId, query);
  }

  @Get("goals")
  goals(@CurrentUser("id") userId: string) {
    return this.exercise.goals(userId);
  }

  @Post("goals")
  createGoal(
    @CurrentUser("id") userId: string,
    @Body(new ZodPipe(createExerciseGoalDto)) body: CreateExerciseGoalDto,
  ) {
    return this.exercise.createGoal(userId, body);
  }

  @Patch("goals/:id")
  updateGoal(
    @CurrentUser("id") userId: string,
    @Param("id") id: string,
    @Body(new ZodPipe(updateExerciseGoalDto)) body: UpdateExerciseGoalDto,
  ) {
    return this.exercise.updateGoal(userId, id, body);
  }

  @Delete("goals/:id")
  removeGoal(@CurrentUser("id") userId: string, @Param("id") id: string) {
    return this.exercise.removeGoal(userId, id);
  }
}
