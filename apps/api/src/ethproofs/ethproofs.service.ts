import { Injectable, Logger } from "@nestjs/common";
import { z } from "zod";
import type {
  EthproofsCluster,
  ProvedProofPayload,
  ProvingProofPayload,
  QueuedProofPayload
} from "@blockprover/shared";
import { AppConfigService } from "../config/app-config.service";

const SUCCESS_STATUS_CODE = 200;

const ClusterListSchema = z.array(
  z.object({ id: z.number(), nickname: z.string().optional() }).passthrough()
);

const SubmissionSchema = z.object({ proof_id: z.number().optional() }).passthrough();

export interface ProvedReport {
  block: number;
  clusterId: number;
  provingTimeMs: number;
  provingCycles: number;
  proof: string;
  verifierId: string;
}

type ProofStage = "queued" | "proving" | "proved";

/**
 * Client for the ethproofs attestation API. Report calls are fire-once: a
 * non-200 answer is logged and reported as `false`, transport errors throw.
 */
@Injectable()
export class EthproofsService {
  private readonly logger = new Logger(EthproofsService.name);
  private readonly baseUrl: string;
  private readonly apiKey: string;

  constructor(config: AppConfigService) {
    this.baseUrl = config.ethproofsApiUrl;
    this.apiKey = config.ethproofsApiKey;
  }

  async submitQueued(block: number, clusterId: number): Promise<boolean> {
    const payload: QueuedProofPayload = { block_number: block, cluster_id: clusterId };
    return this.submit("queued", payload);
  }

  async submitProving(block: number, clusterId: number): Promise<boolean> {
    const payload: ProvingProofPayload = { block_number: block, cluster_id: clusterId };
    return this.submit("proving", payload);
  }

  async submitProved(report: ProvedReport): Promise<boolean> {
    const payload: ProvedProofPayload = {
      block_number: report.block,
      cluster_id: report.clusterId,
      proving_time: report.provingTimeMs,
      proving_cycles: report.provingCycles,
      proof: report.proof,
      verifier_id: report.verifierId
    };
    return this.submit("proved", payload);
  }

  async getClusters(): Promise<EthproofsCluster[]> {
    const res = await fetch(`${this.baseUrl}/clusters`, { headers: this.headers() });
    if (!res.ok) {
      throw new Error(`Failed to list clusters: ${res.status}`);
    }

    const parsed = ClusterListSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error(`Unexpected clusters response: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async submit(
    stage: ProofStage,
    payload: QueuedProofPayload | ProvingProofPayload | ProvedProofPayload
  ): Promise<boolean> {
    const res = await fetch(`${this.baseUrl}/proofs/${stage}`, {
      method: "POST",
      headers: this.headers(),
      body: JSON.stringify(payload)
    });

    if (res.status !== SUCCESS_STATUS_CODE) {
      this.logger.warn(
        `Failed to submit ${stage} proof for block ${payload.block_number}. Status: ${res.status}`
      );
      return false;
    }

    const body = SubmissionSchema.safeParse(await res.json().catch(() => ({})));
    const proofId = body.success ? body.data.proof_id : undefined;
    this.logger.log(
      `Submitted ${stage} proof for block ${payload.block_number} with proof_id ${proofId ?? "unknown"}.`
    );
    return true;
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.apiKey}`,
      "Content-Type": "application/json"
    };
  }
}
