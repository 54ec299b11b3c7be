import { Test } from "@nestjs/testing";
import OpenAI from "openai";
import { APP_CONFIG } from "../common/config";
import { MealAnalysisError } from "./meal-analysis.errors";
import { MealVisionService, OPENAI_CLIENT, toMealAnalysisError } from "./meal-vision.service";
import fixture from "./fixtures/salmon-plate.json";

const IMAGE_URL = "data:image/jpeg;base64,/9j/4AAQ";

const completion = (content: string | null) => ({
  choices: [{ message: { content } }],
  usage: { prompt_tokens: 1100, completion_tokens: 400, total_tokens: 1500 },
});

const rateLimited = () => new OpenAI.APIError(429, { message: "slow down" }, "slow down", {});

describe("MealVisionService", () => {
  let service: MealVisionService;
  let create: jest.Mock;

  const build = async (client: unknown) => {
    const module = await Test.createTestingModule({
      providers: [
        MealVisionService,
        { provide: OPENAI_CLIENT, useValue: client },
        {
          provide: APP_CONFIG,
          useValue: { openai: { apiKey: "test-key", model: "gpt-4o", timeoutMs: 60_000 } },
        },
      ],
    }).compile();
    return module.get(MealVisionService);
  };

  beforeEach(async () => {
    create = jest.fn();
    service = await build({ chat: { completions: { create } } });
  });

  afterEach(() => jest.useRealTimers());

  // -- success ----------------------------------------------------------------

  it("sends the prompt and image, and parses a fenced JSON reply", async () => {
    create.mockResolvedValue(
      completion("Here is the analysis:\n```json\n" + JSON.stringify(fixture) + "\n```"),
    );

    const analysis = await service.analyzeMealImage(IMAGE_URL);

    expect(analysis.model).toBe("gpt-4o");
    expect(analysis.tokensUsed).toBe(1500);
    expect(analysis.result.mealIdentification.primaryDishes).toEqual([
      "Grilled Salmon",
      "Quinoa Salad",
    ]);

    const [request, options] = create.mock.calls[0];
    expect(request).toMatchObject({ model: "gpt-4o", max_tokens: 3000, temperature: 0.2 });
    expect(request.messages[0].content[1]).toEqual({
      type: "image_url",
      image_url: { url: IMAGE_URL },
    });
    expect(options).toEqual({ timeout: 60_000 });
  });

  it("fails with API_NOT_CONFIGURED when there is no client", async () => {
    const unconfigured = await build(null);

    await expect(unconfigured.analyzeMealImage(IMAGE_URL)).rejects.toMatchObject({
      code: "API_NOT_CONFIGURED",
    });
  });

  it("rejects replies without a JSON object", async () => {
    create.mockResolvedValue(completion("I cannot see any food in this picture."));

    await expect(service.analyzeMealImage(IMAGE_URL)).rejects.toMatchObject({
      code: "INVALID_RESPONSE",
    });
  });

  // -- retries ----------------------------------------------------------------

  it("retries rate-limited requests with exponential backoff", async () => {
    jest.useFakeTimers();
    create
      .mockRejectedValueOnce(rateLimited())
      .mockRejectedValueOnce(rateLimited())
      .mockResolvedValueOnce(completion(JSON.stringify(fixture)));

    const pending = service.analyzeMealImage(IMAGE_URL);
    await jest.advanceTimersByTimeAsync(999);
    expect(create).toHaveBeenCalledTimes(1);
    await jest.advanceTimersByTimeAsync(1);
    expect(create).toHaveBeenCalledTimes(2);
    await jest.advanceTimersByTimeAsync(2000);

    await expect(pending).resolves.toMatchObject({ tokensUsed: 1500 });
    expect(create).toHaveBeenCalledTimes(3);
  });

  it("gives up after three retries", async () => {
    jest.useFakeTimers();
    create.mockRejectedValue(rateLimited());

    const pending = service.analyzeMealImage(IMAGE_URL).catch((err: unknown) => err);
    await jest.advanceTimersByTimeAsync(7000);

    expect(await pending).toMatchObject({ code: "RATE_LIMIT_EXCEEDED" });
    expect(create).toHaveBeenCalledTimes(4);
  });

  it("does not retry other failures", async () => {
    create.mockRejectedValue(new OpenAI.APIError(401, { message: "bad key" }, "bad key", {}));

    await expect(service.analyzeMealImage(IMAGE_URL)).rejects.toMatchObject({
      code: "INVALID_API_KEY",
    });
    expect(create).toHaveBeenCalledTimes(1);
  });
});

describe("toMealAnalysisError", () => {
  const codeOf = (err: unknown) => {
    const mapped = toMealAnalysisError(err);
    return mapped instanceof MealAnalysisError ? mapped.code : undefined;
  };

  it("maps HTTP statuses", () => {
    expect(codeOf(new OpenAI.APIError(401, undefined, undefined, {}))).toBe("INVALID_API_KEY");
    expect(codeOf(rateLimited())).toBe("RATE_LIMIT_EXCEEDED");
    expect(codeOf(new OpenAI.APIError(503, undefined, undefined, {}))).toBe("SERVER_ERROR");
  });

  it("carries the API message on bad requests", () => {
    const mapped = toMealAnalysisError(
      new OpenAI.APIError(400, { message: "image too small" }, "image too small", {}),
    );
    expect(mapped).toBeInstanceOf(MealAnalysisError);
    expect(mapped).toMatchObject({ message: "Invalid request: image too small" });
  });

  it("reports unexpected statuses with their code", () => {
    expect(toMealAnalysisError(new OpenAI.APIError(418, undefined, undefined, {}))).toMatchObject({
      code: "UNKNOWN_ERROR",
      message: "Unknown error occurred (Code: 418). Please try again.",
    });
  });

  it("treats connection failures as network errors", () => {
    expect(codeOf(new OpenAI.APIConnectionError({ message: "socket hang up" }))).toBe(
      "NETWORK_ERROR",
    );
  });

  it("passes other errors through", () => {
    const err = new TypeError("boom");
    expect(toMealAnalysisError(err)).toBe(err);
  });
});
