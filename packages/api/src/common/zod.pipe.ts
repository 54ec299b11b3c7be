import {
  PipeTransform,
  Injectable,
  BadRequestException,
} from "@nestjs/common";
import type { ZodType, ZodTypeDef } from "zod";

@Injectable()
export class ZodPipe<T> implements PipeTransform<unknown, T> {
  constructor(private schema: ZodType<T, ZodTypeDef, unknown>) {}

  transform(value: unknown): T {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      const errors = result.error.errors.map(
        (e) => `${e.path.join(".")}: ${e.message}`,
      );
      throw new BadRequestException({ message: "Validation failed", errors });
    }
    return result.data;
  }
}
