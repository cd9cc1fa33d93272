import {
  Controller,
  Get,
  Patch,
  Post,
  Body,
  HttpCode,
  UseGuards,
} from "@nestjs/common";
import { UsersService } from "./users.service";
import { JwtAuthGuard } from "../auth/jwt-auth.guard";
import { CurrentUser } from "../common/user.decorator";
import { ZodPipe } from "../common/zod.pipe";
import { deleteAccountDto, updateUserDto } from "@vitalog/shared";
import type { DeleteAccountDto, UpdateUserDto } from "@vitalog/shared";

@Controller("users")
@UseGuards(JwtAuthGuard)
export class UsersController {
  constructor(private users: UsersService) {}

  @Get("me")
  getProfile(@CurrentUser("id") userId: string) {
    return this.users.getProfile(userId);
  }

  @Patch("me")
  updateProfile(
    @CurrentUser("id") userId: string,
    @Body(new ZodPipe(updateUserDto)) body: UpdateUserDto,
  ) {
    return this.users.updateProfile(userId, body);
  }

  // POST rather than DELETE so the password can travel in the body
  @Post("me/delete")
  @HttpCode(200)
  deleteAccount(
    @CurrentUser("id") userId: string,
    @Body(new ZodPipe(deleteAccountDto)) body: DeleteAccountDto,
  ) {
    return this.users.deleteAccount(userId, body);
  }
}
