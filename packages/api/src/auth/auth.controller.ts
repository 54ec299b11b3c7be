import {
  Controller,
  Post,
  Body,
  HttpCode,
  UseGuards,
} from "@nestjs/common";
import { AuthService } from "./auth.service";
import { registerDto, loginDto, refreshDto } from "@glucocare/shared";
import type { RegisterDto, LoginDto, RefreshDto } from "@glucocare/shared";
import { ZodPipe } from "../common/zod.pipe";
import { JwtAuthGuard } from "./jwt-auth.guard";

@Controller("auth")
export class AuthController {
  constructor(private auth: AuthService) {}

  @Post("register")
  register(@Body(new ZodPipe(registerDto)) body: RegisterDto) {
    return this.auth.register(body);
  }

  @Post("login")
  @HttpCode(200)
  login(@Body(new ZodPipe(loginDto)) body: LoginDto) {
    return this.auth.login(body);
  }

  @Post("refresh")
  @HttpCode(200)
  refresh(@Body(new ZodPipe(refreshDto)) body: RefreshDto) {
    return this.auth.refresh(body.refreshToken);
  }

  @Post("logout")
  @HttpCode(200)
  @UseGuards(JwtAuthGuard)
  async logout(@Body(new ZodPipe(refreshDto)) body: RefreshDto) {
    await this.auth.logout(body.refreshToken);
    return { message: "Logged out" };
  }
}
