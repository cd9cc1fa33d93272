import {
  Controller,
  Post,
  Body,
  HttpCode,
  UseGuards,
} from "@nestjs/common";
import { Throttle, ThrottlerGuard } from "@nestjs/throttler";
import { AuthService } from "./auth.service";
import {
  registerDto,
  loginDto,
  refreshDto,
  changePasswordDto,
} from "@vitalog/shared";
import type {
  ChangePasswordDto,
  LoginDto,
  RefreshDto,
  RegisterDto,
} from "@vitalog/shared";
import { ZodPipe } from "../common/zod.pipe";
import { CurrentUser } from "../common/user.decorator";
import { JwtAuthGuard } from "./jwt-auth.guard";

@Controller("auth")
export class AuthController {
  constructor(private auth: AuthService) {}

  @Post("register")
  @UseGuards(ThrottlerGuard)
  @Throttle({ default: { limit: 5, ttl: 60_000 } })
  register(@Body(new ZodPipe(registerDto)) body: RegisterDto) {
    return this.auth.register(body);
  }

  @Post("login")
  @HttpCode(200)
  @UseGuards(ThrottlerGuard)
  @Throttle({ default: { limit: 10, ttl: 60_000 } })
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

  @Post("change-password")
  @HttpCode(200)
  @UseGuards(JwtAuthGuard)
  async changePassword(
    @CurrentUser("id") userId: string,
    @Body(new ZodPipe(changePasswordDto)) body: ChangePasswordDto,
  ) {
    await this.auth.changePassword(userId, body);
    return { message: "Password changed" };
  }
}
