import { Module } from "@nestjs/common";
import { ProofInvokerService } from "./proof-invoker.service";

@Module({
  providers: [ProofInvokerService],
  exports: [ProofInvokerService]
})
export class ProofInvokerModule {}
