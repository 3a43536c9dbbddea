import { Module } from "@nestjs/common";
import { AppConfigModule } from "../config/app-config.module";
import { JobRegistryService } from "./job-registry.service";
import { JobsController } from "./jobs.controller";
import { JobsService } from "./jobs.service";
import { ProofInvokerModule } from "./proof-invoker.module";

@Module({
  imports: [AppConfigModule, ProofInvokerModule],
  providers: [JobRegistryService, JobsService],
  controllers: [JobsController]
})
export class JobsModule {}
