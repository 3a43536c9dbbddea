import { Module } from "@nestjs/common";
import { AppConfigModule } from "../config/app-config.module";
import { EthproofsService } from "./ethproofs.service";

@Module({
  imports: [AppConfigModule],
  providers: [EthproofsService],
  exports: [EthproofsService]
})
export class EthproofsModule {}
