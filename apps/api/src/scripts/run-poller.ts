import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { PollerModule } from "../poller/poller.module";
import { BlockPollerService } from "../poller/block-poller.service";

async function run() {
  const app = await NestFactory.createApplicationContext(PollerModule, {
    logger: ["error", "warn", "log"]
  });
  app.enableShutdownHooks();

  const poller = app.get(BlockPollerService);
  await poller.verifyCluster();
  await poller.run();
  await app.close();
}

run().catch((error) => {
  new Logger("BlockPoller").error(`Block poller failed to start: ${(error as Error).message}`);
  process.exit(1);
});
