import { Test } from "@nestjs/testing";
import { UnsupportedMediaTypeException } from "@nestjs/common";
import { mealAnalysisResultSchema } from "@glucocare/shared";
import { DatabaseService } from "../database/database.service";
import { createTestDatabase, insertTestUser } from "../database/testing";
import { AnalysisUsageService } from "./analysis-usage.service";
import { MealAnalysisCacheService } from "./meal-analysis-cache.service";
import { MealAnalysisService } from "./meal-analysis.service";
import { MealVisionService } from "./meal-vision.service";
import fixture from "./fixtures/salmon-plate.json";

const jpeg = (seed: number) => {
  const buffer = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, seed]);
  return { buffer, mimetype: "image/jpeg", size: buffer.length };
};

describe("MealAnalysisService", () => {
  let service: MealAnalysisService;
  let usage: AnalysisUsageService;
  let database: DatabaseService;
  let vision: { analyzeMealImage: jest.Mock };
  let userId: string;

  const now = new Date("2024-03-10T12:00:00Z");

  beforeEach(async () => {
    database = createTestDatabase();
    userId = insertTestUser(database).id;
    vision = {
      analyzeMealImage: jest.fn().mockResolvedValue({
        result: mealAnalysisResultSchema.parse(fixture),
        model: "gpt-4o",
        tokensUsed: 1500,
      }),
    };

    const module = await Test.createTestingModule({
      providers: [
        MealAnalysisService,
        MealAnalysisCacheService,
        AnalysisUsageService,
        { provide: DatabaseService, useValue: database },
        { provide: MealVisionService, useValue: vision },
      ],
    }).compile();

    service = module.get(MealAnalysisService);
    usage = module.get(AnalysisUsageService);
  });

  afterEach(() => database.onModuleDestroy());

  it("analyzes a new photo and records usage", async () => {
    const response = await service.analyzePhoto(userId, jpeg(1), now);

    expect(response).toMatchObject({
      cached: false,
      apiVersion: "gpt-4o",
      tokensUsed: 1500,
      timestamp: "2024-03-10T12:00:00.000Z",
    });
    expect(vision.analyzeMealImage.mock.calls[0][0]).toBe(
      `data:image/jpeg;base64,${jpeg(1).buffer.toString("base64")}`,
    );
    expect(usage.getUsage(userId)).toEqual({
      totalAnalyses: 1,
      totalTokensUsed: 1500,
      averageConfidence: 0.9,
      lastAnalysisDate: "2024-03-10T12:00:00.000Z",
      estimatedCost: 0.02,
    });
  });

  it("serves a repeated photo from the cache without counting usage", async () => {
    const first = await service.analyzePhoto(userId, jpeg(1), now);
    const second = await service.analyzePhoto(userId, jpeg(1), now);

    expect(second.id).toBe(first.id);
    expect(second.cached).toBe(true);
    expect(vision.analyzeMealImage).toHaveBeenCalledTimes(1);
    expect(usage.getUsage(userId).totalAnalyses).toBe(1);
  });

  it("keeps a running average of confidence", async () => {
    await service.analyzePhoto(userId, jpeg(1), now);
    vision.analyzeMealImage.mockResolvedValueOnce({
      result: { ...mealAnalysisResultSchema.parse(fixture), confidence: 0.5 },
      model: "gpt-4o",
      tokensUsed: 500,
    });
    await service.analyzePhoto(userId, jpeg(2), now);

    const totals = usage.getUsage(userId);
    expect(totals.totalAnalyses).toBe(2);
    expect(totals.totalTokensUsed).toBe(2000);
    expect(totals.averageConfidence).toBeCloseTo(0.7);
    expect(totals.estimatedCost).toBeCloseTo(0.04);
  });

  it("rejects unsupported uploads before calling the model", async () => {
    const gif = { buffer: Buffer.from("GIF89a"), mimetype: "image/gif", size: 6 };

    await expect(service.analyzePhoto(userId, gif, now)).rejects.toThrow(
      UnsupportedMediaTypeException,
    );
    expect(vision.analyzeMealImage).not.toHaveBeenCalled();
  });

  it("does not cache failed analyses", async () => {
    vision.analyzeMealImage.mockRejectedValueOnce(new Error("boom"));

    await expect(service.analyzePhoto(userId, jpeg(1), now)).rejects.toThrow("boom");
    await service.analyzePhoto(userId, jpeg(1), now);

    expect(vision.analyzeMealImage).toHaveBeenCalledTimes(2);
  });

  it("reports empty usage for new users", () => {
    expect(usage.getUsage(userId)).toEqual({
      totalAnalyses: 0,
      totalTokensUsed: 0,
      averageConfidence: 0,
      lastAnalysisDate: null,
      estimatedCost: 0,
    });
  });
});
