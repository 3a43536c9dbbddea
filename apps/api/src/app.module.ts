import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { AppConfigModule } from "./config/app-config.module";
import { JobsModule } from "./jobs/jobs.module";
import { ProvingKeysModule } from "./keys/proving-keys.module";
import { HealthController } from "./health.controller";

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true }), AppConfigModule, ProvingKeysModule, JobsModule],
  controllers: [HealthController]
})
export class AppModule {}
