import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { enabledLogLevels, loadConfig } from "./common/config";

async function bootstrap() {
  const config = loadConfig();
  const app = await NestFactory.create(AppModule, {
    logger: enabledLogLevels(config.logLevel),
  });

  app.enableCors(config.corsOrigin ? { origin: config.corsOrigin.split(",") } : undefined);
  app.enableShutdownHooks();
  await app.listen(config.port);
}

bootstrap().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
