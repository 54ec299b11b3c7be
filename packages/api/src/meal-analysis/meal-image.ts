import { PayloadTooLargeException, UnsupportedMediaTypeException } from "@nestjs/common";
import { createHash } from "crypto";
import { MealAnalysisError } from "./meal-analysis.errors";

export const MAX_IMAGE_SIZE = 10 * 1024 * 1024; // 10 MB

export const ALLOWED_IMAGE_TYPES = new Set([
  "image/jpeg",
  "image/png",
  "image/webp",
  "image/heic",
]);

// Signatures at offset 0; WebP also needs "WEBP" at 8, HEIC "ftyp" at 4
const MAGIC_BYTES: Array<{ mime: string; bytes: number[] }> = [
  { mime: "image/jpeg", bytes: [0xff, 0xd8, 0xff] },
  { mime: "image/png", bytes: [0x89, 0x50, 0x4e, 0x47] },
  { mime: "image/webp", bytes: [0x52, 0x49, 0x46, 0x46] },
];

export interface UploadedImage {
  buffer: Buffer;
  mimetype: string;
  size: number;
}

function matchesSignature(buffer: Buffer, mime: string): boolean {
  if (mime === "image/heic") {
    return buffer.length >= 12 && buffer.toString("ascii", 4, 8) === "ftyp";
  }

  const sig = MAGIC_BYTES.find((s) => s.mime === mime);
  if (!sig || buffer.length < sig.bytes.length) return false;
  if (!sig.bytes.every((byte, i) => buffer[i] === byte)) return false;

  if (mime === "image/webp") {
    return buffer.length >= 12 && buffer.toString("ascii", 8, 12) === "WEBP";
  }
  return true;
}

export function validateMealImage(file: UploadedImage): void {
  if (file.size > MAX_IMAGE_SIZE) {
    throw new PayloadTooLargeException("Image is too large. Maximum size is 10 MB.");
  }
  if (!ALLOWED_IMAGE_TYPES.has(file.mimetype)) {
    throw new UnsupportedMediaTypeException(
      "Unsupported image type. Please upload a JPEG, PNG, WebP or HEIC photo.",
    );
  }
  if (!matchesSignature(file.buffer, file.mimetype)) {
    throw MealAnalysisError.imageProcessingFailed();
  }
}

export function imageHash(buffer: Buffer): string {
  return createHash("sha256").update(buffer).digest("hex");
}

export function toDataUrl(file: Pick<UploadedImage, "buffer" | "mimetype">): string {
  return `data:${file.mimetype};base64,${file.buffer.toString("base64")}`;
}
