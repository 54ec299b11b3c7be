import {
  Inject,
  Injectable,
  UnauthorizedException,
  ConflictException,
} from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import * as bcrypt from "bcrypt";
import { randomUUID } from "crypto";
import { eq } from "drizzle-orm";
import { APP_CONFIG, AppConfig } from "../common/config";
import { isValidTimeZone } from "../common/time";
import { DatabaseService } from "../database/database.service";
import { refreshTokens, users } from "../database/schema";
import type { RegisterDto, LoginDto, AuthTokens } from "@glucocare/shared";

@Injectable()
export class AuthService {
  constructor(
    private database: DatabaseService,
    private jwt: JwtService,
    @Inject(APP_CONFIG) private config: Pick<AppConfig, "defaultTimezone">,
  ) {}

  async register(dto: RegisterDto): Promise<AuthTokens> {
    const existing = this.database.db
      .select({ id: users.id })
      .from(users)
      .where(eq(users.email, dto.email))
      .get();
    if (existing) {
      throw new ConflictException("Email already registered");
    }

    const timezone =
      dto.timezone && isValidTimeZone(dto.timezone)
        ? dto.timezone
        : this.config.defaultTimezone;

    const hash = await bcrypt.hash(dto.password, 10);
    const user = this.database.db
      .insert(users)
      .values({ email: dto.email, password: hash, name: dto.name, timezone })
      .returning()
      .get();

    return this.generateTokens(user.id);
  }

  async login(dto: LoginDto): Promise<AuthTokens> {
    const user = this.database.db
      .select()
      .from(users)
      .where(eq(users.email, dto.email))
      .get();
    if (!user) {
      throw new UnauthorizedException("Invalid credentials");
    }

    const valid = await bcrypt.compare(dto.password, user.password);
    if (!valid) {
      throw new UnauthorizedException("Invalid credentials");
    }

    return this.generateTokens(user.id);
  }

  async refresh(refreshToken: string): Promise<AuthTokens> {
    const stored = this.database.db
      .select()
      .from(refreshTokens)
      .where(eq(refreshTokens.token, refreshToken))
      .get();

    if (!stored || stored.expiresAt < new Date()) {
      if (stored) {
        this.database.db.delete(refreshTokens).where(eq(refreshTokens.id, stored.id)).run();
      }
      throw new UnauthorizedException("Invalid or expired refresh token");
    }

    // Rotate: the old token is single-use
    this.database.db.delete(refreshTokens).where(eq(refreshTokens.id, stored.id)).run();

    return this.generateTokens(stored.userId);
  }

  async logout(refreshToken: string): Promise<void> {
    this.database.db
      .delete(refreshTokens)
      .where(eq(refreshTokens.token, refreshToken))
      .run();
  }

  private async generateTokens(userId: string): Promise<AuthTokens> {
    const accessToken = this.jwt.sign({ sub: userId });

    const token = randomUUID();
    const expiresAt = new Date();
    expiresAt.setDate(expiresAt.getDate() + 7);

    this.database.db.insert(refreshTokens).values({ token, userId, expiresAt }).run();

    return { accessToken, refreshToken: token };
  }
}
