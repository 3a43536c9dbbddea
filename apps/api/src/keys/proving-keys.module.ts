import { Module } from "@nestjs/common";
import { AppConfigModule } from "../config/app-config.module";
import { ProvingKeysService } from "./proving-keys.service";

@Module({
  imports: [AppConfigModule],
  providers: [ProvingKeysService]
})
export class ProvingKeysModule {}
