import { Injectable, Logger, OnApplicationBootstrap } from "@nestjs/common";
import { execFile } from "child_process";
import fs from "fs";
import { mkdir } from "fs/promises";
import path from "path";
import { promisify } from "util";
import { ConfigurationError } from "../common/errors";
import { AppConfigService } from "../config/app-config.service";

const execFileAsync = promisify(execFile);

@Injectable()
export class ProvingKeysService implements OnApplicationBootstrap {
  private readonly logger = new Logger(ProvingKeysService.name);

  constructor(private readonly config: AppConfigService) {}

  async onApplicationBootstrap() {
    await this.ensureKeys();
  }

  /**
   * Copies the app and aggregation proving keys into place when missing.
   * Both source URIs must be configured. Download failures are logged; the
   * server keeps serving without the keys.
   */
  async ensureKeys(): Promise<void> {
    const appPkUri = this.config.appPkUri;
    const aggPkUri = this.config.aggPkUri;
    if (!appPkUri) {
      throw new ConfigurationError("APP_PK_URI");
    }
    if (!aggPkUri) {
      throw new ConfigurationError("AGG_PK_URI");
    }

    try {
      await this.download(appPkUri, this.config.appPkPath);
      await this.download(aggPkUri, this.config.aggPkPath);
    } catch (error) {
      this.logger.error(`Failed to download proving keys: ${(error as Error).message}`);
    }
  }

  private async download(sourceUri: string, destination: string) {
    if (fs.existsSync(destination)) {
      this.logger.log(`Proving key already present at ${destination}.`);
      return;
    }

    await mkdir(path.dirname(destination), { recursive: true });
    const startedAt = Date.now();
    await execFileAsync(this.config.keyDownloadCommand, ["cp", sourceUri, destination]);
    this.logger.log(
      `Downloaded ${sourceUri} to ${destination} in ${((Date.now() - startedAt) / 1000).toFixed(1)}s.`
    );
  }
}
