import { Inject, Injectable, Logger } from "@nestjs/common";
import OpenAI from "openai";
import type { MealAnalysisResult } from "@glucocare/shared";
import { APP_CONFIG, type AppConfig } from "../common/config";
import { MealAnalysisError } from "./meal-analysis.errors";
import { parseAnalysisContent } from "./analysis-parsing";
import { MEAL_ANALYSIS_PROMPT } from "./meal-analysis.prompt";

export const OPENAI_CLIENT = Symbol("OPENAI_CLIENT");

export const MAX_RATE_LIMIT_RETRIES = 3;

export interface VisionAnalysis {
  result: MealAnalysisResult;
  model: string;
  tokensUsed: number;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Maps an SDK failure onto the analysis error it stands for. */
export function toMealAnalysisError(err: unknown): unknown {
  if (err instanceof MealAnalysisError) return err;
  if (err instanceof OpenAI.APIConnectionError) return MealAnalysisError.networkError();
  if (!(err instanceof OpenAI.APIError)) return err;

  const status = err.status;
  if (status === undefined) return MealAnalysisError.networkError();
  if (status === 400) return MealAnalysisError.invalidRequest(apiErrorMessage(err));
  if (status === 401) return MealAnalysisError.invalidApiKey();
  if (status === 429) return MealAnalysisError.rateLimitExceeded();
  if (status >= 500 && status <= 599) return MealAnalysisError.serverError();
  return MealAnalysisError.unknownError(status);
}

function apiErrorMessage(err: InstanceType<typeof OpenAI.APIError>): string {
  const body = err.error;
  if (typeof body === "object" && body !== null && "message" in body) {
    const { message } = body;
    if (typeof message === "string") return message;
  }
  return "Unknown API error";
}

@Injectable()
export class MealVisionService {
  private readonly logger = new Logger(MealVisionService.name);

  constructor(
    @Inject(OPENAI_CLIENT) private openai: OpenAI | null,
    @Inject(APP_CONFIG) private config: Pick<AppConfig, "openai">,
  ) {}

  /**
   * Runs the vision request, retrying rate-limit failures with 1 s, 2 s and
   * 4 s backoff before giving up.
   */
  async analyzeMealImage(imageDataUrl: string, retryCount = 0): Promise<VisionAnalysis> {
    try {
      return await this.performAnalysis(imageDataUrl);
    } catch (err) {
      if (
        err instanceof MealAnalysisError &&
        err.code === "RATE_LIMIT_EXCEEDED" &&
        retryCount < MAX_RATE_LIMIT_RETRIES
      ) {
        const delayMs = 2 ** retryCount * 1000;
        this.logger.warn(`Rate limited, retrying in ${delayMs / 1000}s (attempt ${retryCount + 1})`);
        await sleep(delayMs);
        return this.analyzeMealImage(imageDataUrl, retryCount + 1);
      }
      throw err;
    }
  }

  private async performAnalysis(imageDataUrl: string): Promise<VisionAnalysis> {
    if (!this.openai) throw MealAnalysisError.apiNotConfigured();

    const { model, timeoutMs } = this.config.openai;
    const startTime = Date.now();

    const completion = await this.openai.chat.completions
      .create(
        {
          model,
          max_tokens: 3000,
          temperature: 0.2,
          messages: [
            {
              role: "user",
              content: [
                { type: "text", text: MEAL_ANALYSIS_PROMPT },
                { type: "image_url", image_url: { url: imageDataUrl } },
              ],
            },
          ],
        },
        { timeout: timeoutMs },
      )
      .catch((err: unknown) => {
        throw toMealAnalysisError(err);
      });

    const elapsedSec = ((Date.now() - startTime) / 1000).toFixed(1);
    const usage = completion.usage;
    this.logger.log(
      `OpenAI responded in ${elapsedSec}s (tokens: ${usage?.prompt_tokens ?? "?"}in/${usage?.completion_tokens ?? "?"}out)`,
    );

    const result = parseAnalysisContent(completion.choices[0]?.message?.content);
    return { result, model, tokensUsed: usage?.total_tokens ?? 0 };
  }
}
