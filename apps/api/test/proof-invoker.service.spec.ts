import { chmod, mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { InvocationError } from "../src/common/errors";
import { ProofInvokerService } from "../src/jobs/proof-invoker.service";

async function writeScript(dir: string, name: string, body: string): Promise<string> {
  const script = path.join(dir, name);
  await writeFile(script, `#!/bin/sh\n${body}\n`);
  await chmod(script, 0o755);
  return script;
}

describe("ProofInvokerService", () => {
  let dir: string;
  const invoker = new ProofInvokerService();

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "proof-invoker-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("passes the job id, extra args and env and captures both streams", async () => {
    const script = await writeScript(
      dir,
      "prove.sh",
      'echo "job=$1 arg=$2 mode=$MODE"\necho "warn" >&2\nexit 0'
    );
    const stdoutPath = path.join(dir, "stdout.log");
    const stderrPath = path.join(dir, "stderr.log");

    const proofProcess = invoker.launch({
      script,
      jobId: "abc-123",
      args: ["make-input"],
      env: { MODE: "prove-stark" },
      stdoutPath,
      stderrPath
    });

    expect(proofProcess.pid).toBeGreaterThan(0);
    await expect(proofProcess.exited).resolves.toEqual({ exitCode: 0, signal: null });
    expect(proofProcess.status()).toBe("Completed");
    expect(proofProcess.isRunning()).toBe(false);
    await expect(readFile(stdoutPath, "utf-8")).resolves.toBe("job=abc-123 arg=make-input mode=prove-stark\n");
    await expect(readFile(stderrPath, "utf-8")).resolves.toBe("warn\n");
  });

  it("reports a non-zero exit as Failed", async () => {
    const script = await writeScript(dir, "fail.sh", "exit 3");

    const proofProcess = invoker.launch({
      script,
      jobId: "job-1",
      stdoutPath: path.join(dir, "stdout.log"),
      stderrPath: path.join(dir, "stderr.log")
    });

    await proofProcess.exited;
    expect(proofProcess.exitCode).toBe(3);
    expect(proofProcess.status()).toBe("Failed");
  });

  it("runs the script in the requested working directory", async () => {
    const script = await writeScript(dir, "touch.sh", "echo $1 > marker.txt");
    const workDir = path.join(dir, "work");
    await mkdir(workDir);

    const proofProcess = invoker.launch({
      script,
      jobId: "job-2",
      cwd: workDir,
      stdoutPath: path.join(dir, "stdout.log"),
      stderrPath: path.join(dir, "stderr.log")
    });

    await proofProcess.exited;
    await expect(readFile(path.join(workDir, "marker.txt"), "utf-8")).resolves.toBe("job-2\n");
  });

  it("throws InvocationError when the script does not exist", () => {
    expect(() =>
      invoker.launch({
        script: path.join(dir, "missing.sh"),
        jobId: "job-3",
        stdoutPath: path.join(dir, "stdout.log"),
        stderrPath: path.join(dir, "stderr.log")
      })
    ).toThrow(new InvocationError(`Wrapper script not found at ${path.join(dir, "missing.sh")}`));
  });
});

