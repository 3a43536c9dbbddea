import { Injectable } from "@nestjs/common";
import path from "path";
import { z } from "zod";
import type { EthproofsEnvironment } from "@blockprover/shared";
import { ConfigurationError } from "../common/errors";

const ETHPROOFS_API_URLS: Record<EthproofsEnvironment, string> = {
  staging: "https://staging--ethproofs.netlify.app/api/v0",
  production: "https://ethproofs.org/api/v0"
};

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  JOBS_DIR: z.string().min(1).default("/app/jobs"),
  PROVE_JOB_SCRIPT: z.string().min(1).default("bin/prove-job.sh"),
  PROVE_BLOCK_SCRIPT: z.string().min(1).default("bin/prove-block.sh"),
  APP_PK_URI: z.string().optional(),
  AGG_PK_URI: z.string().optional(),
  APP_PK_PATH: z.string().min(1).default("/app/app_pk"),
  AGG_PK_PATH: z.string().min(1).default("/app/agg_pk"),
  KEY_DOWNLOAD_COMMAND: z.string().min(1).default("s5cmd"),
  RPC_URL: z.string().optional(),
  ETHPROOFS_ENV: z.enum(["staging", "production"]).default("staging"),
  ETHPROOFS_API_URL: z.string().url().optional(),
  ETHPROOFS_API_KEY: z.string().optional(),
  ETHPROOFS_CLUSTER_ID: z.coerce.number().int().optional(),
  ETHPROOFS_VERIFIER_ID: z.string().optional(),
  PROOF_CONFIG_TAG: z.string().min(1).default("default"),
  POLLER_START_CHECKPOINT: z.coerce.number().int().nonnegative().default(0),
  BLOCK_TIME_SECONDS: z.coerce.number().positive().default(12),
  PREPARE_INPUT_RETRY_MS: z.coerce.number().int().nonnegative().default(5000),
  PREPARE_INPUT_MAX_ATTEMPTS: z.coerce.number().int().positive().optional(),
  POLLER_ERROR_BACKOFF_MS: z.coerce.number().int().nonnegative().default(10000)
});

export type AppConfig = z.infer<typeof EnvSchema>;

@Injectable()
export class AppConfigService {
  private readonly config: AppConfig;

  constructor() {
    this.config = EnvSchema.parse(process.env);
  }

  get port(): number {
    return this.config.PORT;
  }

  get jobsDir(): string {
    return path.resolve(this.config.JOBS_DIR);
  }

  get proveJobScript(): string {
    return path.resolve(this.config.PROVE_JOB_SCRIPT);
  }

  get proveBlockScript(): string {
    return path.resolve(this.config.PROVE_BLOCK_SCRIPT);
  }

  get appPkUri(): string | undefined {
    return this.config.APP_PK_URI || undefined;
  }

  get aggPkUri(): string | undefined {
    return this.config.AGG_PK_URI || undefined;
  }

  get appPkPath(): string {
    return this.config.APP_PK_PATH;
  }

  get aggPkPath(): string {
    return this.config.AGG_PK_PATH;
  }

  get keyDownloadCommand(): string {
    return this.config.KEY_DOWNLOAD_COMMAND;
  }

  get rpcUrl(): string {
    return this.required("RPC_URL", this.config.RPC_URL);
  }

  get ethproofsEnv(): EthproofsEnvironment {
    return this.config.ETHPROOFS_ENV;
  }

  get ethproofsApiUrl(): string {
    return (this.config.ETHPROOFS_API_URL ?? ETHPROOFS_API_URLS[this.ethproofsEnv]).replace(
      /\/$/,
      ""
    );
  }

  get ethproofsApiKey(): string {
    return this.required("ETHPROOFS_API_KEY", this.config.ETHPROOFS_API_KEY);
  }

  get clusterId(): number {
    return this.required("ETHPROOFS_CLUSTER_ID", this.config.ETHPROOFS_CLUSTER_ID);
  }

  get verifierId(): string {
    return this.required("ETHPROOFS_VERIFIER_ID", this.config.ETHPROOFS_VERIFIER_ID);
  }

  get proofConfigTag(): string {
    return this.config.PROOF_CONFIG_TAG;
  }

  get startCheckpoint(): number {
    return this.config.POLLER_START_CHECKPOINT;
  }

  get blockTimeSeconds(): number {
    return this.config.BLOCK_TIME_SECONDS;
  }

  get prepareInputRetryMs(): number {
    return this.config.PREPARE_INPUT_RETRY_MS;
  }

  get prepareInputMaxAttempts(): number | undefined {
    return this.config.PREPARE_INPUT_MAX_ATTEMPTS;
  }

  get pollerErrorBackoffMs(): number {
    return this.config.POLLER_ERROR_BACKOFF_MS;
  }

  private required<T>(name: string, value: T | undefined): T {
    if (value === undefined || value === "") {
      throw new ConfigurationError(name);
    }
    return value;
  }
}
