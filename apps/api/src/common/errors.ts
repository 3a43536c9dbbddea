export class ConfigurationError extends Error {
  constructor(readonly variable: string) {
    super(`Environment variable ${variable} must be set`);
    this.name = "ConfigurationError";
  }
}

/** The external prover could not be launched at all. */
export class InvocationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InvocationError";
  }
}

/** A phase of the external prover ran and exited unsuccessfully. */
export class ExternalPhaseError extends Error {
  constructor(
    readonly phase: string,
    readonly block: number,
    readonly exitCode: number | null
  ) {
    super(`${phase} failed for block ${block} (exit code ${exitCode ?? "none"})`);
    this.name = "ExternalPhaseError";
  }
}

export class CheckpointError extends Error {
  constructor(readonly checkpoint: number, readonly head: number) {
    super(`Last checked block ${checkpoint} >= latest Ethereum block ${head}`);
    this.name = "CheckpointError";
  }
}
