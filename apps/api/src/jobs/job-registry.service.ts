import { Injectable, Logger } from "@nestjs/common";
import { mkdir } from "fs/promises";
import path from "path";
import { AppConfigService } from "../config/app-config.service";
import { KeyedMutex } from "../common/keyed-mutex";
import { ProofInvokerService } from "./proof-invoker.service";
import { ProofProcess } from "./proof-process";

export const HTTP_JOB_MODE = "prove-stark";

export interface Job {
  id: string;
  mode: string;
  jobDir: string;
  stdoutPath: string;
  stderrPath: string;
  process: ProofProcess;
}

@Injectable()
export class JobRegistryService {
  private readonly logger = new Logger(JobRegistryService.name);
  private readonly jobs = new Map<string, Job>();
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly config: AppConfigService,
    private readonly invoker: ProofInvokerService
  ) {}

  async startOrGet(jobId: string): Promise<{ job: Job; started: boolean }> {
    return this.locks.runExclusive(jobId, async () => {
      const existing = this.jobs.get(jobId);
      if (existing && existing.process.isRunning()) {
        return { job: existing, started: false };
      }

      const jobDir = path.join(this.config.jobsDir, jobId);
      await mkdir(jobDir, { recursive: true });

      const stdoutPath = path.join(jobDir, "stdout.log");
      const stderrPath = path.join(jobDir, "stderr.log");
      const proofProcess = this.invoker.launch({
        script: this.config.proveJobScript,
        jobId,
        env: { JOBS_DIR: this.config.jobsDir, MODE: HTTP_JOB_MODE },
        stdoutPath,
        stderrPath
      });

      const job: Job = {
        id: jobId,
        mode: HTTP_JOB_MODE,
        jobDir,
        stdoutPath,
        stderrPath,
        process: proofProcess
      };
      this.jobs.set(jobId, job);
      this.watch(job);

      return { job, started: true };
    });
  }

  get(jobId: string): Job | undefined {
    return this.jobs.get(jobId);
  }

  private watch(job: Job) {
    void job.process.exited.then(({ exitCode, signal }) => {
      this.logger.log(
        `Job ${job.id} (pid ${job.process.pid}) exited with ${
          signal ? `signal ${signal}` : `code ${exitCode}`
        }.`
      );
    });
  }
}
