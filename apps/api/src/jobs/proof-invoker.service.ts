import { Injectable, Logger } from "@nestjs/common";
import { ChildProcess, spawn } from "child_process";
import fs from "fs";
import { InvocationError } from "../common/errors";
import { ProofProcess } from "./proof-process";

export interface LaunchRequest {
  script: string;
  jobId: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
  stdoutPath: string;
  stderrPath: string;
}

@Injectable()
export class ProofInvokerService {
  private readonly logger = new Logger(ProofInvokerService.name);

  launch(request: LaunchRequest): ProofProcess {
    const { script, jobId, args = [], stdoutPath, stderrPath } = request;

    if (!fs.existsSync(script)) {
      throw new InvocationError(`Wrapper script not found at ${script}`);
    }

    const stdoutFd = fs.openSync(stdoutPath, "w");
    const stderrFd = fs.openSync(stderrPath, "w");
    const release = () => {
      this.closeQuietly(stdoutFd);
      this.closeQuietly(stderrFd);
    };

    let child: ChildProcess;
    try {
      child = spawn(script, [jobId, ...args], {
        cwd: request.cwd,
        env: { ...process.env, ...request.env },
        stdio: ["ignore", stdoutFd, stderrFd]
      });
    } catch (error) {
      release();
      throw new InvocationError(`Failed to launch ${script}`, { cause: error });
    }

    if (child.pid === undefined) {
      // The "error" event still fires on the next tick; keep it from going unhandled.
      child.once("error", (error) => {
        this.logger.warn(`Launch of ${script} for ${jobId} failed: ${error.message}`);
      });
      release();
      throw new InvocationError(`Failed to launch ${script} for ${jobId}`);
    }

    this.logger.log(`Launched ${script} for ${jobId} (pid ${child.pid}).`);
    return new ProofProcess(child, child.pid, release);
  }

  private closeQuietly(fd: number) {
    try {
      fs.closeSync(fd);
    } catch (error) {
      this.logger.warn(`Failed to close log descriptor ${fd}: ${(error as Error).message}`);
    }
  }
}
