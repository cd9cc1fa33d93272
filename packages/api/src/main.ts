import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { APP_CONFIG } from "./config/configuration";
import type { AppConfig } from "./config/configuration";

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = app.get<AppConfig>(APP_CONFIG);

  app.enableCors({
    origin: config.corsOrigins.length ? config.corsOrigins : true,
    credentials: true,
  });
  app.enableShutdownHooks();

  await app.listen(config.port);
  Logger.log(`API listening on port ${config.port} (${config.env})`, "Bootstrap");
}

bootstrap().catch((err: unknown) => {
  Logger.error(
    "Failed to start",
    err instanceof Error ? err.stack : String(err),
    "Bootstrap",
  );
  process.exit(1);
});
