import {
  Injectable,
  Logger,
  NotFoundException,
  UnauthorizedException,
} from "@nestjs/common";
import * as bcrypt from "bcrypt";
import { UsersRepository } from "../database/repositories/users.repository";
import type { UserRow } from "../database/schema";
import type {
  DeleteAccountDto,
  UpdateUserDto,
  UserResponse,
} from "@vitalog/shared";

export function toUserResponse(user: UserRow): UserResponse {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    heightCm: user.heightCm,
    createdAt: user.createdAt.toISOString(),
  };
}

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(private users: UsersRepository) {}

  async getProfile(userId: string): Promise<UserResponse> {
    const user = await this.users.findById(userId);
    if (!user) throw new NotFoundException("User not found");
    return toUserResponse(user);
  }

  async updateProfile(
    userId: string,
    dto: UpdateUserDto,
  ): Promise<UserResponse> {
    const user = await this.users.update(userId, {
      ...(dto.name !== undefined && { name: dto.name || null }),
      ...(dto.heightCm !== undefined && { heightCm: dto.heightCm }),
    });
    if (!user) throw new NotFoundException("User not found");
    return toUserResponse(user);
  }

  async deleteAccount(userId: string, dto: DeleteAccountDto) {
    const user = await this.users.findById(userId);
    if (!user) throw new NotFoundException("User not found");

    const valid = await bcrypt.compare(dto.password, user.passwordHash);
    if (!valid) throw new UnauthorizedException("Invalid password");

    await this.users.delete(userId);
    this.logger.log(`Deleted account ${userId} and all of its data`);
    return { deleted: true };
  }
}
