import { HttpStatus } from "@nestjs/common";

/**
 * Base for feature errors that carry a stable machine-readable code.
 * Rendered by DomainExceptionFilter as `{ statusCode, error, message }`.
 */
export abstract class DomainError<C extends string = string> extends Error {
  abstract readonly status: HttpStatus;

  constructor(
    readonly code: C,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }

  /** Extra fields merged into the error response body. */
  details(): Record<string, unknown> {
    return {};
  }
}

export type ExerciseErrorCode = "DATA_LOAD_FAILED" | "INVALID_WORKOUT";

export class ExerciseError extends DomainError<ExerciseErrorCode> {
  get status(): HttpStatus {
    return this.code === "INVALID_WORKOUT"
      ? HttpStatus.BAD_REQUEST
      : HttpStatus.INTERNAL_SERVER_ERROR;
  }

  static dataLoadFailed(detail: string): ExerciseError {
    return new ExerciseError("DATA_LOAD_FAILED", `Failed to load exercise data: ${detail}`);
  }

  static invalidWorkout(detail: string): ExerciseError {
    return new ExerciseError("INVALID_WORKOUT", `Invalid workout: ${detail}`);
  }
}

export type HealthErrorCode = "DATA_LOAD_FAILED" | "INVALID_METRICS";

export class HealthError extends DomainError<HealthErrorCode> {
  get status(): HttpStatus {
    return this.code === "INVALID_METRICS"
      ? HttpStatus.BAD_REQUEST
      : HttpStatus.INTERNAL_SERVER_ERROR;
  }

  static dataLoadFailed(detail: string): HealthError {
    return new HealthError("DATA_LOAD_FAILED", `Failed to load health data: ${detail}`);
  }

  static invalidMetrics(detail: string): HealthError {
    return new HealthError("INVALID_METRICS", `Invalid health metrics: ${detail}`);
  }
}

export type MealPlanningErrorCode = "DATA_LOAD_FAILED" | "SAVE_FAILED";

export class MealPlanningError extends DomainError<MealPlanningErrorCode> {
  get status(): HttpStatus {
    return HttpStatus.INTERNAL_SERVER_ERROR;
  }

  static dataLoadFailed(detail: string): MealPlanningError {
    return new MealPlanningError("DATA_LOAD_FAILED", `Failed to load meal plan: ${detail}`);
  }

  static saveFailed(detail: string): MealPlanningError {
    return new MealPlanningError("SAVE_FAILED", `Failed to save planned meal: ${detail}`);
  }
}

/** Message of an unknown thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
