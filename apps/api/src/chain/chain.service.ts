import { Injectable } from "@nestjs/common";
import { AppConfigService } from "../config/app-config.service";
import { ChainClient, createChainClient } from "./chain-client";

@Injectable()
export class ChainService {
  private readonly client: ChainClient;

  constructor(config: AppConfigService) {
    this.client = createChainClient(config.rpcUrl);
  }

  /** Head block number, bypassing viem's block number cache. */
  async getLatestBlockNumber(): Promise<number> {
    return Number(await this.client.getBlockNumber({ cacheTime: 0 }));
  }
}
