import { BadRequestException, Injectable, NotFoundException } from "@nestjs/common";
import { eq } from "drizzle-orm";
import { isValidTimeZone } from "../common/time";
import { DatabaseService } from "../database/database.service";
import { User, users } from "../database/schema";
import type { UpdateUserDto, UserResponse } from "@glucocare/shared";

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    timezone: user.timezone,
    diabetesType: user.diabetesType,
    usesGlp1: user.usesGlp1,
    createdAt: user.createdAt.toISOString(),
  };
}

@Injectable()
export class UsersService {
  constructor(private database: DatabaseService) {}

  getUser(userId: string): User {
    const user = this.database.db.select().from(users).where(eq(users.id, userId)).get();
    if (!user) throw new NotFoundException("User not found");
    return user;
  }

  /** IANA time zone the user's calendar days are computed in. */
  getTimezone(userId: string): string {
    return this.getUser(userId).timezone;
  }

  getProfile(userId: string): UserResponse {
    return toUserResponse(this.getUser(userId));
  }

  updateProfile(userId: string, dto: UpdateUserDto): UserResponse {
    if (dto.timezone !== undefined && !isValidTimeZone(dto.timezone)) {
      throw new BadRequestException(`Unknown time zone: ${dto.timezone}`);
    }
    const user = this.getUser(userId);
    const changes = {
      name: dto.name,
      timezone: dto.timezone,
      diabetesType: dto.diabetesType,
      usesGlp1: dto.usesGlp1,
    };
    if (Object.values(changes).every((v) => v === undefined)) {
      return toUserResponse(user);
    }

    const updated = this.database.db
      .update(users)
      .set(changes)
      .where(eq(users.id, userId))
      .returning()
      .get();
    return toUserResponse(updated);
  }
}
