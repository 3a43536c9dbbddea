import { Injectable, Logger } from "@nestjs/common";
import { mkdir, readFile } from "fs/promises";
import path from "path";
import { AppConfigService } from "../config/app-config.service";
import { encodeCanonicalBase64, JsonValue } from "../common/canonical-json";
import { ExternalPhaseError } from "../common/errors";
import { withFixedRetry } from "../common/retry";
import { EthproofsService } from "../ethproofs/ethproofs.service";
import { readIntegerFile, readLatencyMs } from "../jobs/job-artifacts";
import { ProofInvokerService } from "../jobs/proof-invoker.service";
import { blockWorkDir } from "./interval";

export type ProvingPhase = "make-input" | "prove";

export interface CycleArtifacts {
  numInstructions: number;
  latencyMs: number;
  proof: string | null;
}

export interface CycleResult {
  block: number;
  artifacts: CycleArtifacts;
  reported: boolean;
}

/**
 * One blocking proving cycle for a boundary block: queued → make-input →
 * proving → prove → proved.
 */
@Injectable()
export class ProvingCycleService {
  private readonly logger = new Logger(ProvingCycleService.name);
  private readonly clusterId: number;
  private readonly verifierId: string;

  constructor(
    private readonly config: AppConfigService,
    private readonly invoker: ProofInvokerService,
    private readonly ethproofs: EthproofsService
  ) {
    this.clusterId = config.clusterId;
    this.verifierId = config.verifierId;
  }

  async run(block: number): Promise<CycleResult> {
    const startedAt = Date.now();
    const workDir = blockWorkDir(this.config.jobsDir, block, this.config.proofConfigTag);
    await mkdir(workDir, { recursive: true });
    this.logger.log(`Proving block ${block} in ${workDir}.`);

    await this.ethproofs.submitQueued(block, this.clusterId);

    await withFixedRetry(
      async () => {
        const exitCode = await this.runPhase(block, "make-input", workDir);
        if (exitCode !== 0) {
          throw new ExternalPhaseError("make-input", block, exitCode);
        }
      },
      {
        delayMs: this.config.prepareInputRetryMs,
        maxAttempts: this.config.prepareInputMaxAttempts,
        logger: this.logger,
        label: `make-input for block ${block}`,
        retryIf: (error) => error instanceof ExternalPhaseError
      }
    );

    await this.ethproofs.submitProving(block, this.clusterId);

    const exitCode = await this.runPhase(block, "prove", workDir);
    if (exitCode !== 0) {
      throw new ExternalPhaseError("prove", block, exitCode);
    }

    const artifacts = await this.readArtifacts(workDir);
    if (artifacts.proof === null) {
      this.logger.warn(`No proof.json for block ${block} in ${workDir}; skipping proved report.`);
      return { block, artifacts, reported: false };
    }

    const reported = await this.ethproofs.submitProved({
      block,
      clusterId: this.clusterId,
      provingTimeMs: artifacts.latencyMs,
      provingCycles: artifacts.numInstructions,
      proof: artifacts.proof,
      verifierId: this.verifierId
    });

    this.logger.log(
      `Done proving block ${block} in ${((Date.now() - startedAt) / 1000).toFixed(1)}s ` +
        `(${artifacts.numInstructions} instructions, ${artifacts.latencyMs}ms prover latency).`
    );
    return { block, artifacts, reported };
  }

  async readArtifacts(workDir: string): Promise<CycleArtifacts> {
    const [numInstructions, latencyMs, proof] = await Promise.all([
      readIntegerFile(path.join(workDir, "num_instret")),
      readLatencyMs(workDir, ["latency_ms", "latency_ms.txt"]),
      this.readProof(path.join(workDir, "proof.json"))
    ]);

    return {
      numInstructions: numInstructions ?? 0,
      latencyMs: latencyMs ?? 0,
      proof
    };
  }

  private async runPhase(block: number, phase: ProvingPhase, workDir: string): Promise<number | null> {
    const proofProcess = this.invoker.launch({
      script: this.config.proveBlockScript,
      jobId: String(block),
      args: phase === "make-input" ? ["make-input"] : [],
      cwd: this.config.jobsDir,
      env: { OUTPUT_DIR: workDir, PROOF_CONFIG_TAG: this.config.proofConfigTag },
      stdoutPath: path.join(workDir, `${phase}.stdout.log`),
      stderrPath: path.join(workDir, `${phase}.stderr.log`)
    });

    const { exitCode, signal } = await proofProcess.exited;
    this.logger.log(
      `${phase} for block ${block} exited with ${signal ? `signal ${signal}` : `code ${exitCode}`}.`
    );
    return exitCode;
  }

  private async readProof(proofPath: string): Promise<string | null> {
    let raw: string;
    try {
      raw = await readFile(proofPath, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return null;
      }
      throw error;
    }
    const proof: JsonValue = JSON.parse(raw);
    return encodeCanonicalBase64(proof);
  }
}
