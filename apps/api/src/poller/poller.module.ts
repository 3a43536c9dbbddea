import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { AppConfigModule } from "../config/app-config.module";
import { ChainService } from "../chain/chain.service";
import { EthproofsModule } from "../ethproofs/ethproofs.module";
import { ProofInvokerModule } from "../jobs/proof-invoker.module";
import { BlockPollerService } from "./block-poller.service";
import { ProvingCycleService } from "./proving-cycle.service";

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    AppConfigModule,
    EthproofsModule,
    ProofInvokerModule
  ],
  providers: [ChainService, BlockPollerService, ProvingCycleService],
  exports: [BlockPollerService]
})
export class PollerModule {}
