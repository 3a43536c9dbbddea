import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import { AppConfigService } from "../config/app-config.service";
import { ChainService } from "../chain/chain.service";
import { CheckpointError } from "../common/errors";
import { sleep } from "../common/sleep";
import { EthproofsService } from "../ethproofs/ethproofs.service";
import { boundaryFor, estimateWaitMs, PROVING_INTERVAL } from "./interval";
import { ProvingCycleService } from "./proving-cycle.service";

export type PollOutcome =
  | { kind: "proved"; head: number; block: number }
  | { kind: "idle"; head: number; waitMs: number };

/**
 * Watches the chain head and runs one proving cycle per interval boundary.
 *
 * The checkpoint lives in memory only. After a restart it falls back to
 * POLLER_START_CHECKPOINT, so the current boundary is proved and reported
 * again; ethproofs is expected to accept a repeated report for the same
 * block and cluster.
 */
@Injectable()
export class BlockPollerService implements OnModuleDestroy {
  private readonly logger = new Logger(BlockPollerService.name);
  private checkpoint: number;
  private stopped = false;

  constructor(
    private readonly config: AppConfigService,
    private readonly chain: ChainService,
    private readonly ethproofs: EthproofsService,
    private readonly cycle: ProvingCycleService
  ) {
    this.checkpoint = config.startCheckpoint;
  }

  get lastCheckedBoundary(): number {
    return this.checkpoint;
  }

  /** Refuses to start when the configured cluster is unknown to ethproofs. */
  async verifyCluster(): Promise<void> {
    const clusterId = this.config.clusterId;
    const clusters = await this.ethproofs.getClusters();
    const ids = clusters.map((cluster) => cluster.id);
    if (!ids.includes(clusterId)) {
      throw new Error(
        `Cluster ${clusterId} not found in ethproofs clusters. Available IDs: ${ids.join(", ") || "none"}`
      );
    }
  }

  async pollOnce(): Promise<PollOutcome> {
    const head = await this.chain.getLatestBlockNumber();
    this.logger.log(`Latest Ethereum block is ${head}`);

    if (this.checkpoint >= head) {
      throw new CheckpointError(this.checkpoint, head);
    }

    const target = boundaryFor(head);
    if (target !== this.checkpoint) {
      this.checkpoint = target;
      await this.cycle.run(target);
      return { kind: "proved", head, block: target };
    }

    return { kind: "idle", head, waitMs: estimateWaitMs(head, this.config.blockTimeSeconds) };
  }

  async run(): Promise<void> {
    this.stopped = false;
    this.logger.log(
      `Polling for every ${PROVING_INTERVAL}th block starting after checkpoint ${this.checkpoint}.`
    );

    while (!this.stopped) {
      try {
        const outcome = await this.pollOnce();
        if (outcome.kind === "idle") {
          this.logger.log(`Waiting ~${(outcome.waitMs / 1000).toFixed(1)}s until next check...`);
          await sleep(outcome.waitMs);
        }
      } catch (error) {
        this.logger.error(`Poll iteration failed: ${(error as Error).message}`);
        await sleep(this.config.pollerErrorBackoffMs);
      }
    }

    this.logger.log("Block poller stopped.");
  }

  stop() {
    this.stopped = true;
  }

  onModuleDestroy() {
    this.stop();
  }
}
