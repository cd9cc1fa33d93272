import {
  Inject,
  Injectable,
  Logger,
  UnauthorizedException,
  ConflictException,
} from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import * as bcrypt from "bcrypt";
import { randomUUID } from "crypto";
import { APP_CONFIG } from "../config/configuration";
import type { AppConfig } from "../config/configuration";
import { UsersRepository } from "../database/repositories/users.repository";
import { RefreshTokenRepository } from "../database/repositories/refresh-token.repository";
import { isUniqueViolation } from "../database/pg-errors";
import type {
  RegisterDto,
  LoginDto,
  AuthTokens,
  ChangePasswordDto,
} from "@vitalog/shared";

export const BCRYPT_ROUNDS = 10;

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private users: UsersRepository,
    private refreshTokens: RefreshTokenRepository,
    private jwt: JwtService,
    @Inject(APP_CONFIG) private config: AppConfig,
  ) {}

  async register(dto: RegisterDto): Promise<AuthTokens> {
    const existing = await this.users.findByEmail(dto.email);
    if (existing) {
      throw new ConflictException("Email already registered");
    }

    const passwordHash = await bcrypt.hash(dto.password, BCRYPT_ROUNDS);
    // findByEmail can race a concurrent signup; the unique index decides.
    const user = await this.users
      .create({ email: dto.email, passwordHash, name: dto.name || null })
      .catch((err: unknown) => {
        if (isUniqueViolation(err)) {
          throw new ConflictException("Email already registered");
        }
        throw err;
      });
    this.logger.log(`Registered user ${user.id}`);

    return this.generateTokens(user.id);
  }

  async login(dto: LoginDto): Promise<AuthTokens> {
    const user = await this.users.findByEmail(dto.email);
    if (!user) {
      throw new UnauthorizedException("Invalid credentials");
    }

    const valid = await bcrypt.compare(dto.password, user.passwordHash);
    if (!valid) {
      throw new UnauthorizedException("Invalid credentials");
    }

    return this.generateTokens(user.id);
  }

  async refresh(refreshToken: string): Promise<AuthTokens> {
    const stored = await this.refreshTokens.findByToken(refreshToken);

    if (!stored || stored.expiresAt < new Date()) {
      if (stored) {
        await this.refreshTokens.deleteById(stored.id);
      }
      throw new UnauthorizedException("Invalid or expired refresh token");
    }

    // Rotate: a concurrent refresh with the same token loses the race here
    const deleted = await this.refreshTokens.deleteById(stored.id);
    if (deleted === 0) {
      throw new UnauthorizedException("Invalid or expired refresh token");
    }

    return this.generateTokens(stored.userId);
  }

  async logout(refreshToken: string): Promise<void> {
    await this.refreshTokens.deleteByToken(refreshToken);
  }

  async changePassword(userId: string, dto: ChangePasswordDto): Promise<void> {
    const user = await this.users.findById(userId);
    if (!user) throw new UnauthorizedException();

    const valid = await bcrypt.compare(dto.oldPassword, user.passwordHash);
    if (!valid) throw new UnauthorizedException("Invalid current password");

    const passwordHash = await bcrypt.hash(dto.newPassword, BCRYPT_ROUNDS);
    await this.users.update(userId, { passwordHash });
    const revoked = await this.refreshTokens.deleteForUser(userId);
    this.logger.log(
      `Password changed for user ${userId}, revoked ${revoked} sessions`,
    );
  }

  private async generateTokens(userId: string): Promise<AuthTokens> {
    const accessToken = this.jwt.sign({ sub: userId });

    const token = randomUUID();
    const expiresAt = new Date();
    expiresAt.setDate(expiresAt.getDate() + this.config.auth.refreshTokenTtlDays);

    await this.refreshTokens.create({ token, userId, expiresAt });

    return { accessToken, refreshToken: token };
  }
}
