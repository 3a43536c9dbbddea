export type JobStatus = "InProgress" | "Completed" | "Failed";

export type EthproofsEnvironment = "staging" | "production";

export type MachineType = "multi" | "single";

export interface HealthResponse {
  status: "healthy";
}

export interface JobStartedResponse {
  message: "job started";
  proof_uuid: string;
  pid: number;
  job_dir: string;
}

export interface JobAlreadyRunningResponse {
  message: "job already running";
  proof_uuid: string;
  pid: number;
  stdout_path: string;
  stderr_path: string;
}

export type StartProofResponse = JobStartedResponse | JobAlreadyRunningResponse;

export interface ProofStateResponse {
  status: JobStatus;
  num_instructions: number;
  e2e_latency_ms: number | null;
}

export interface LogsResponse {
  stdout: string[];
  stderr: string[];
}

export interface ErrorResponse {
  error: string;
}

export interface QueuedProofPayload {
  block_number: number;
  cluster_id: number;
}

export type ProvingProofPayload = QueuedProofPayload;

export interface ProvedProofPayload extends QueuedProofPayload {
  proving_time: number;
  proving_cycles: number;
  proof: string;
  verifier_id: string;
}

export interface EthproofsCluster {
  id: number;
  nickname?: string;
}

export interface EthproofsBlockProof {
  proving_time?: number | null;
}

export interface EthproofsBlock {
  block_number: number;
  gas_used?: number | null;
  transaction_count?: number | null;
  timestamp?: string | null;
  proofs?: EthproofsBlockProof[];
}

export interface EthproofsBlocksPage {
  rows: EthproofsBlock[];
}
