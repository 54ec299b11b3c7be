import { PayloadTooLargeException, UnsupportedMediaTypeException } from "@nestjs/common";
import { extractJsonObject, parseAnalysisContent } from "./analysis-parsing";
import { imageHash, validateMealImage } from "./meal-image";
import fixture from "./fixtures/salmon-plate.json";

describe("analysis parsing", () => {
  it("extracts the outermost JSON object from surrounding text", () => {
    expect(extractJsonObject('Sure! {"a": {"b": 1}} Enjoy.')).toBe('{"a": {"b": 1}}');
    expect(extractJsonObject("no json here")).toBeNull();
    expect(extractJsonObject("} backwards {")).toBeNull();
  });

  it("parses a valid reply", () => {
    const result = parseAnalysisContent(JSON.stringify(fixture));
    expect(result.healthScore.overall).toBe(8.5);
  });

  it("fails on empty content", () => {
    expect(() => parseAnalysisContent(null)).toThrow(
      "Invalid response from OpenAI. Please try again.",
    );
  });

  it("fails on malformed JSON", () => {
    expect(() => parseAnalysisContent('{"confidence": 0.9,}')).toThrow(
      expect.objectContaining({ code: "ANALYSIS_PARSING_FAILED" }),
    );
  });

  it("names the first missing field", () => {
    const { warnings: _warnings, ...withoutWarnings } = fixture;

    expect(() => parseAnalysisContent(JSON.stringify(withoutWarnings))).toThrow(
      "Failed to parse analysis result: warnings: Required",
    );
  });

  it.each([
    [{ confidence: 1.2 }, "Invalid confidence score"],
    [{ nutritionalAnalysis: { ...fixture.nutritionalAnalysis, totalCalories: 0 } }, "Invalid calorie data"],
    [
      {
        diabeticAnalysis: {
          ...fixture.diabeticAnalysis,
          glycemicIndex: { value: 120, category: "High" },
        },
      },
      "Invalid glycemic index",
    ],
    [{ healthScore: { ...fixture.healthScore, overall: 11 } }, "Invalid health score"],
  ])("rejects out-of-range values (%#)", (override, message) => {
    expect(() => parseAnalysisContent(JSON.stringify({ ...fixture, ...override }))).toThrow(
      `Invalid analysis data: ${message}`,
    );
  });
});

describe("meal image validation", () => {
  const file = (bytes: number[] | string, mimetype: string, size?: number) => {
    const buffer = typeof bytes === "string" ? Buffer.from(bytes, "ascii") : Buffer.from(bytes);
    return { buffer, mimetype, size: size ?? buffer.length };
  };

  it("accepts images whose bytes match their type", () => {
    expect(() => validateMealImage(file([0xff, 0xd8, 0xff, 0xdb], "image/jpeg"))).not.toThrow();
    expect(() =>
      validateMealImage(file([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a], "image/png")),
    ).not.toThrow();
    expect(() => validateMealImage(file("RIFF\0\0\0\0WEBPVP8 ", "image/webp"))).not.toThrow();
    expect(() => validateMealImage(file("\0\0\0\x18ftypheic", "image/heic"))).not.toThrow();
  });

  it("rejects oversized uploads", () => {
    expect(() =>
      validateMealImage(file([0xff, 0xd8, 0xff], "image/jpeg", 10 * 1024 * 1024 + 1)),
    ).toThrow(PayloadTooLargeException);
  });

  it("rejects unsupported types", () => {
    expect(() => validateMealImage(file("GIF89a", "image/gif"))).toThrow(
      UnsupportedMediaTypeException,
    );
  });

  it("rejects bytes that do not match the declared type", () => {
    expect(() => validateMealImage(file("RIFF\0\0\0\0WAVEfmt ", "image/webp"))).toThrow(
      expect.objectContaining({ code: "IMAGE_PROCESSING_FAILED" }),
    );
    expect(() => validateMealImage(file([0x89, 0x50, 0x4e, 0x47], "image/jpeg"))).toThrow(
      expect.objectContaining({ code: "IMAGE_PROCESSING_FAILED" }),
    );
  });

  it("hashes image bytes", () => {
    expect(imageHash(Buffer.from("abc"))).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
  });
});
