import { mealAnalysisResultSchema, type MealAnalysisResult } from "@glucocare/shared";
import { describeError } from "../common/domain-error";
import { MealAnalysisError } from "./meal-analysis.errors";

/** Text from the first "{" through the last "}", or null when there is none. */
export function extractJsonObject(content: string): string | null {
  const start = content.indexOf("{");
  const end = content.lastIndexOf("}");
  if (start === -1 || end === -1 || end < start) return null;
  return content.slice(start, end + 1);
}

export function validateAnalysisResult(result: MealAnalysisResult): void {
  if (result.confidence < 0 || result.confidence > 1) {
    throw MealAnalysisError.invalidAnalysisData("Invalid confidence score");
  }
  if (result.nutritionalAnalysis.totalCalories <= 0) {
    throw MealAnalysisError.invalidAnalysisData("Invalid calorie data");
  }
  const gi = result.diabeticAnalysis.glycemicIndex.value;
  if (gi < 0 || gi > 100) {
    throw MealAnalysisError.invalidAnalysisData("Invalid glycemic index");
  }
  if (result.healthScore.overall < 0 || result.healthScore.overall > 10) {
    throw MealAnalysisError.invalidAnalysisData("Invalid health score");
  }
}

/** Parses and validates the model's reply text. */
export function parseAnalysisContent(content: string | null | undefined): MealAnalysisResult {
  const json = content ? extractJsonObject(content) : null;
  if (!json) throw MealAnalysisError.invalidResponse();

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw MealAnalysisError.parsingFailed(describeError(err));
  }

  const parsed = mealAnalysisResultSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    throw MealAnalysisError.parsingFailed(`${issue.path.join(".")}: ${issue.message}`);
  }

  validateAnalysisResult(parsed.data);
  return parsed.data;
}
