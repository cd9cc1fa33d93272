import { parseConfig, ConfigError } from "./configuration";

const baseEnv = {
  DATABASE_URL: "postgresql://localhost:5432/vitalog_test",
  JWT_SECRET: "test-secret-test-secret",
};

describe("parseConfig", () => {
  it("applies defaults", () => {
    const config = parseConfig(baseEnv);

    expect(config).toEqual({
      env: "development",
      port: 3000,
      database: {
        url: "postgresql://localhost:5432/vitalog_test",
        autoMigrate: true,
      },
      auth: {
        jwtSecret: "test-secret-test-secret",
        jwtExpiresIn: "15m",
        refreshTokenTtlDays: 7,
      },
      openai: {
        apiKey: null,
        baseUrl: null,
        model: "gpt-4o",
        timeoutMs: 120_000,
      },
      corsOrigins: [],
    });
  });

  it("treats the example placeholder key as missing", () => {
    const config = parseConfig({
      ...baseEnv,
      OPENAI_API_KEY: "your-openai-api-key-here",
    });
    expect(config.openai.apiKey).toBeNull();
  });

  it("parses flags, numbers and origin lists", () => {
    const config = parseConfig({
      ...baseEnv,
      PORT: "8080",
      DB_AUTO_MIGRATE: "false",
      OPENAI_API_KEY: " test-key ",
      CORS_ORIGIN: "http://localhost:5173, https://example.test",
    });
    expect(config.port).toBe(8080);
    expect(config.database.autoMigrate).toBe(false);
    expect(config.openai.apiKey).toBe("test-key");
    expect(config.corsOrigins).toEqual([
      "http://localhost:5173",
      "https://example.test",
    ]);
  });

  it("lists every problem", () => {
    const parse = () => parseConfig({ JWT_SECRET: "short" });

    expect(parse).toThrow(ConfigError);
    expect(parse).toThrow(
      "Invalid configuration:\n  DATABASE_URL: Required\n  JWT_SECRET: must be at least 16 characters",
    );
  });
});
