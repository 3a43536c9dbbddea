import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { Logger } from "@nestjs/common";
import { AppModule } from "./app.module";
import { AppConfigService } from "./config/app-config.service";
import { createValidationPipe } from "./common/validation";

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();
  app.useGlobalPipes(createValidationPipe());

  const port = app.get(AppConfigService).port;
  await app.listen(port);
  new Logger("Bootstrap").log(`Job control service listening on port ${port}`);
}

bootstrap().catch((error) => {
  new Logger("Bootstrap").error("Job control service failed to start", error as Error);
  process.exit(1);
});
