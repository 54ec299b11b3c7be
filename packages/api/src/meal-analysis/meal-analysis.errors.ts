import { HttpStatus } from "@nestjs/common";
import { DomainError } from "../common/domain-error";

export type MealAnalysisErrorCode =
  | "API_NOT_CONFIGURED"
  | "IMAGE_PROCESSING_FAILED"
  | "NETWORK_ERROR"
  | "INVALID_REQUEST"
  | "INVALID_API_KEY"
  | "RATE_LIMIT_EXCEEDED"
  | "SERVER_ERROR"
  | "UNKNOWN_ERROR"
  | "INVALID_RESPONSE"
  | "ANALYSIS_PARSING_FAILED"
  | "INVALID_ANALYSIS_DATA";

const RECOVERY_SUGGESTIONS: Partial<Record<MealAnalysisErrorCode, string>> = {
  API_NOT_CONFIGURED: "Configure your OpenAI API key in the app settings.",
  IMAGE_PROCESSING_FAILED: "Try taking a clearer photo with better lighting.",
  NETWORK_ERROR: "Check your internet connection and try again.",
  INVALID_API_KEY: "Verify your OpenAI API key is correct and has sufficient credits.",
  RATE_LIMIT_EXCEEDED: "Wait a few minutes before analyzing another meal.",
  SERVER_ERROR: "OpenAI services may be temporarily unavailable. Try again in a few minutes.",
};

export class MealAnalysisError extends DomainError<MealAnalysisErrorCode> {
  get status(): HttpStatus {
    switch (this.code) {
      case "API_NOT_CONFIGURED":
        return HttpStatus.SERVICE_UNAVAILABLE;
      case "IMAGE_PROCESSING_FAILED":
        return HttpStatus.UNPROCESSABLE_ENTITY;
      case "RATE_LIMIT_EXCEEDED":
        return HttpStatus.TOO_MANY_REQUESTS;
      default:
        return HttpStatus.BAD_GATEWAY;
    }
  }

  get recoverySuggestion(): string {
    return (
      RECOVERY_SUGGESTIONS[this.code] ?? "Try again or contact support if the problem persists."
    );
  }

  details() {
    return { recoverySuggestion: this.recoverySuggestion };
  }

  static apiNotConfigured() {
    return new MealAnalysisError(
      "API_NOT_CONFIGURED",
      "OpenAI API key not configured. Please check your API configuration.",
    );
  }

  static imageProcessingFailed() {
    return new MealAnalysisError(
      "IMAGE_PROCESSING_FAILED",
      "Failed to process the image. Please try with a different image.",
    );
  }

  static networkError() {
    return new MealAnalysisError(
      "NETWORK_ERROR",
      "Network error occurred. Please check your internet connection.",
    );
  }

  static invalidRequest(detail: string) {
    return new MealAnalysisError("INVALID_REQUEST", `Invalid request: ${detail}`);
  }

  static invalidApiKey() {
    return new MealAnalysisError(
      "INVALID_API_KEY",
      "Invalid API key. Please check your OpenAI API key configuration.",
    );
  }

  static rateLimitExceeded() {
    return new MealAnalysisError(
      "RATE_LIMIT_EXCEEDED",
      "Rate limit exceeded. Please wait a moment before trying again.",
    );
  }

  static serverError() {
    return new MealAnalysisError("SERVER_ERROR", "OpenAI server error. Please try again later.");
  }

  static unknownError(code: number) {
    return new MealAnalysisError(
      "UNKNOWN_ERROR",
      `Unknown error occurred (Code: ${code}). Please try again.`,
    );
  }

  static invalidResponse() {
    return new MealAnalysisError(
      "INVALID_RESPONSE",
      "Invalid response from OpenAI. Please try again.",
    );
  }

  static parsingFailed(detail: string) {
    return new MealAnalysisError(
      "ANALYSIS_PARSING_FAILED",
      `Failed to parse analysis result: ${detail}`,
    );
  }

  static invalidAnalysisData(detail: string) {
    return new MealAnalysisError("INVALID_ANALYSIS_DATA", `Invalid analysis data: ${detail}`);
  }
}
