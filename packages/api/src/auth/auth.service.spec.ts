import { Test } from "@nestjs/testing";
import { UnauthorizedException, ConflictException } from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import * as bcrypt from "bcrypt";
import { AuthService } from "./auth.service";
import { RefreshTokenRepository } from "../database/repositories/refresh-token.repository";
import { UsersRepository } from "../database/repositories/users.repository";
import { APP_CONFIG, parseConfig } from "../config/configuration";

const config = parseConfig({
  DATABASE_URL: "postgresql://localhost/vitalog_test",
  JWT_SECRET: "test-secret-test-secret",
  REFRESH_TOKEN_TTL_DAYS: "7",
});

describe("AuthService", () => {
  let service: AuthService;
  let users: {
    findByEmail: jest.Mock;
    findById: jest.Mock;
    create: jest.Mock;
    update: jest.Mock;
  };
  let refreshTokens: {
    create: jest.Mock;
    findByToken: jest.Mock;
    deleteById: jest.Mock;
    deleteByToken: jest.Mock;
    deleteForUser: jest.Mock;
  };
  let jwt: { sign: jest.Mock };

  beforeEach(async () => {
    users = {
      findByEmail: jest.fn(),
      findById: jest.fn(),
      create: jest.fn(),
      update: jest.fn().mockResolvedValue({}),
    };
    refreshTokens = {
      create: jest.fn().mockResolvedValue(undefined),
      findByToken: jest.fn(),
      deleteById: jest.fn().mockResolvedValue(1),
      deleteByToken: jest.fn().mockResolvedValue(1),
      deleteForUser: jest.fn().mockResolvedValue(2),
    };
    jwt = { sign: jest.fn().mockReturnValue("access-token-123") };

    const module = await Test.createTestingModule({
      providers: [
        AuthService,
        { provide: UsersRepository, useValue: users },
        { provide: RefreshTokenRepository, useValue: refreshTokens },
        { provide: JwtService, useValue: jwt },
        { provide: APP_CONFIG, useValue: config },
      ],
    }).compile();

    service = module.get(AuthService);
  });

  // -- refresh ----------------------------------------------------------------

  describe("refresh", () => {
    it("returns new tokens for a valid refresh token", async () => {
      refreshTokens.findByToken.mockResolvedValue({
        id: "rt-1",
        token: "valid-token",
        userId: "user-1",
        expiresAt: new Date(Date.now() + 86_400_000),
      });

      const result = await service.refresh("valid-token");

      expect(result).toEqual({
        accessToken: "access-token-123",
        refreshToken: expect.any(String),
      });
      expect(refreshTokens.deleteById).toHaveBeenCalledWith("rt-1");
      expect(refreshTokens.create).toHaveBeenCalledWith({
        userId: "user-1",
        token: expect.any(String),
        expiresAt: expect.any(Date),
      });
      expect(jwt.sign).toHaveBeenCalledWith({ sub: "user-1" });
    });

    it("issues refresh tokens that expire after the configured days", async () => {
      refreshTokens.findByToken.mockResolvedValue({
        id: "rt-1",
        token: "valid-token",
        userId: "user-1",
        expiresAt: new Date(Date.now() + 86_400_000),
      });

      const before = Date.now();
      await service.refresh("valid-token");

      const { expiresAt } = refreshTokens.create.mock.calls[0][0];
      const days = (expiresAt.getTime() - before) / 86_400_000;
      expect(days).toBeGreaterThan(6.9);
      expect(days).toBeLessThan(7.1);
    });

    it("throws for a non-existent refresh token", async () => {
      refreshTokens.findByToken.mockResolvedValue(null);

      await expect(service.refresh("nonexistent")).rejects.toThrow(
        UnauthorizedException,
      );
      expect(refreshTokens.deleteById).not.toHaveBeenCalled();
    });

    it("throws and deletes an expired refresh token", async () => {
      refreshTokens.findByToken.mockResolvedValue({
        id: "rt-expired",
        token: "expired-token",
        userId: "user-1",
        expiresAt: new Date(Date.now() - 1000),
      });

      await expect(service.refresh("expired-token")).rejects.toThrow(
        "Invalid or expired refresh token",
      );
      expect(refreshTokens.deleteById).toHaveBeenCalledWith("rt-expired");
      expect(refreshTokens.create).not.toHaveBeenCalled();
    });

    it("rejects a token already consumed by a concurrent refresh", async () => {
      refreshTokens.findByToken.mockResolvedValue({
        id: "rt-1",
        token: "valid-token",
        userId: "user-1",
        expiresAt: new Date(Date.now() + 86_400_000),
      });
      refreshTokens.deleteById.mockResolvedValue(0);

      await expect(service.refresh("valid-token")).rejects.toThrow(
        UnauthorizedException,
      );
      expect(refreshTokens.create).not.toHaveBeenCalled();
    });
  });

  // -- login ------------------------------------------------------------------

  describe("login", () => {
    it("returns tokens for valid credentials", async () => {
      const hash = await bcrypt.hash("correct-password", 4);
      users.findByEmail.mockResolvedValue({
        id: "user-1",
        email: "test@example.com",
        passwordHash: hash,
      });

      const result = await service.login({
        email: "test@example.com",
        password: "correct-password",
      });

      expect(result).toEqual({
        accessToken: "access-token-123",
        refreshToken: expect.any(String),
      });
      expect(jwt.sign).toHaveBeenCalledWith({ sub: "user-1" });
    });

    it("throws for wrong password", async () => {
      const hash = await bcrypt.hash("correct-password", 4);
      users.findByEmail.mockResolvedValue({
        id: "user-1",
        email: "test@example.com",
        passwordHash: hash,
      });

      await expect(
        service.login({ email: "test@example.com", password: "wrong-password" }),
      ).rejects.toThrow("Invalid credentials");
    });

    it("throws for non-existent user", async () => {
      users.findByEmail.mockResolvedValue(null);

      await expect(
        service.login({ email: "nobody@example.com", password: "anything" }),
      ).rejects.toThrow(UnauthorizedException);
    });
  });

  // -- register ---------------------------------------------------------------

  describe("register", () => {
    it("creates user with a bcrypt hash and returns tokens", async () => {
      users.findByEmail.mockResolvedValue(null);
      users.create.mockResolvedValue({ id: "new-user", email: "new@example.com" });

      const result = await service.register({
        email: "new@example.com",
        password: "password123",
        name: "New User",
      });

      expect(result.accessToken).toBe("access-token-123");
      const created = users.create.mock.calls[0][0];
      expect(created.email).toBe("new@example.com");
      expect(created.name).toBe("New User");
      expect(created.passwordHash).not.toBe("password123");
      expect(await bcrypt.compare("password123", created.passwordHash)).toBe(true);
    });

    it("stores a missing name as null", async () => {
      users.findByEmail.mockResolvedValue(null);
      users.create.mockResolvedValue({ id: "new-user" });

      await service.register({ email: "new@example.com", password: "password123" });

      expect(users.create.mock.calls[0][0].name).toBeNull();
    });

    it("maps a unique violation on insert to ConflictException", async () => {
      users.findByEmail.mockResolvedValue(null);
      users.create.mockRejectedValue(
        Object.assign(new Error("duplicate key value"), { code: "23505" }),
      );

      await expect(
        service.register({ email: "race@example.com", password: "password123" }),
      ).rejects.toBeInstanceOf(ConflictException);
    });

    it("rethrows other insert failures unchanged", async () => {
      users.findByEmail.mockResolvedValue(null);
      const failure = Object.assign(new Error("connection lost"), { code: "08006" });
      users.create.mockRejectedValue(failure);

      await expect(
        service.register({ email: "new@example.com", password: "password123" }),
      ).rejects.toBe(failure);
    });

    it("throws ConflictException for duplicate email", async () => {
      users.findByEmail.mockResolvedValue({ id: "existing" });

      await expect(
        service.register({ email: "taken@example.com", password: "password123" }),
      ).rejects.toThrow(ConflictException);
      expect(users.create).not.toHaveBeenCalled();
    });
  });

  // -- password ---------------------------------------------------------------

  describe("changePassword", () => {
    it("stores the new hash and revokes refresh tokens", async () => {
      const hash = await bcrypt.hash("old-password", 4);
      users.findById.mockResolvedValue({ id: "user-1", passwordHash: hash });

      await service.changePassword("user-1", {
        oldPassword: "old-password",
        newPassword: "new-password-1",
      });

      const patch = users.update.mock.calls[0][1];
      expect(users.update).toHaveBeenCalledWith("user-1", {
        passwordHash: expect.any(String),
      });
      expect(await bcrypt.compare("new-password-1", patch.passwordHash)).toBe(true);
      expect(refreshTokens.deleteForUser).toHaveBeenCalledWith("user-1");
    });

    it("rejects a wrong current password", async () => {
      const hash = await bcrypt.hash("old-password", 4);
      users.findById.mockResolvedValue({ id: "user-1", passwordHash: hash });

      await expect(
        service.changePassword("user-1", {
          oldPassword: "not-it",
          newPassword: "new-password-1",
        }),
      ).rejects.toThrow("Invalid current password");
      expect(users.update).not.toHaveBeenCalled();
    });
  });

  // -- logout -----------------------------------------------------------------

  describe("logout", () => {
    it("deletes the refresh token", async () => {
      await service.logout("some-token");

      expect(refreshTokens.deleteByToken).toHaveBeenCalledWith("some-token");
    });
  });
});
