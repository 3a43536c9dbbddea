import { Injectable } from "@nestjs/common";
import type {
  LogsResponse,
  ProofStateResponse,
  StartProofResponse
} from "@blockprover/shared";
import { JobRegistryService } from "./job-registry.service";
import { readInstructionCount, readLatencyMs, tailFile } from "./job-artifacts";

export const DEFAULT_LOG_LINES = 200;

@Injectable()
export class JobsService {
  constructor(private readonly registry: JobRegistryService) {}

  async startProof(proofUuid: string): Promise<{ started: boolean; body: StartProofResponse }> {
    const { job, started } = await this.registry.startOrGet(proofUuid);

    if (!started) {
      return {
        started,
        body: {
          message: "job already running",
          proof_uuid: proofUuid,
          pid: job.process.pid,
          stdout_path: job.stdoutPath,
          stderr_path: job.stderrPath
        }
      };
    }

    return {
      started,
      body: {
        message: "job started",
        proof_uuid: proofUuid,
        pid: job.process.pid,
        job_dir: job.jobDir
      }
    };
  }

  async getProofState(proofUuid: string): Promise<ProofStateResponse | null> {
    const job = this.registry.get(proofUuid);
    if (!job) {
      return null;
    }

    const status = job.process.status();
    const [numInstructions, latencyMs] = await Promise.all([
      readInstructionCount(job.jobDir),
      readLatencyMs(job.jobDir)
    ]);

    return {
      status,
      num_instructions: numInstructions,
      e2e_latency_ms: latencyMs
    };
  }

  async getLogs(proofUuid: string, lines = DEFAULT_LOG_LINES): Promise<LogsResponse | null> {
    const job = this.registry.get(proofUuid);
    if (!job) {
      return null;
    }

    const [stdout, stderr] = await Promise.all([
      tailFile(job.stdoutPath, lines),
      tailFile(job.stderrPath, lines)
    ]);
    return { stdout, stderr };
  }
}
