import { mkdtemp, rm, stat } from "fs/promises";
import os from "os";
import path from "path";
import { AppConfigService } from "../src/config/app-config.service";
import { HTTP_JOB_MODE, JobRegistryService } from "../src/jobs/job-registry.service";
import { FakeInvoker } from "./fakes";
import { InvocationError } from "../src/common/errors";

describe("JobRegistryService", () => {
  const originalEnv = process.env;
  let jobsDir: string;
  let invoker: FakeInvoker;
  let registry: JobRegistryService;

  beforeEach(async () => {
    jobsDir = await mkdtemp(path.join(os.tmpdir(), "job-registry-"));
    process.env = { ...originalEnv, JOBS_DIR: jobsDir, PROVE_JOB_SCRIPT: "/opt/prover/prove-job.sh" };
    invoker = new FakeInvoker();
    registry = new JobRegistryService(new AppConfigService(), invoker);
  });

  afterEach(async () => {
    process.env = originalEnv;
    await rm(jobsDir, { recursive: true, force: true });
  });

  it("creates the job directory and launches the job script", async () => {
    const { job, started } = await registry.startOrGet("abc-123");

    expect(started).toBe(true);
    expect(job.jobDir).toBe(path.join(jobsDir, "abc-123"));
    expect(job.mode).toBe(HTTP_JOB_MODE);
    expect((await stat(job.jobDir)).isDirectory()).toBe(true);
    expect(invoker.launches).toHaveLength(1);
    expect(invoker.launches[0].request).toEqual({
      script: "/opt/prover/prove-job.sh",
      jobId: "abc-123",
      env: { JOBS_DIR: jobsDir, MODE: "prove-stark" },
      stdoutPath: path.join(jobsDir, "abc-123", "stdout.log"),
      stderrPath: path.join(jobsDir, "abc-123", "stderr.log")
    });
  });

  it("returns the running job instead of launching twice", async () => {
    const first = await registry.startOrGet("abc-123");
    const second = await registry.startOrGet("abc-123");

    expect(second.started).toBe(false);
    expect(second.job.process.pid).toBe(first.job.process.pid);
    expect(invoker.launches).toHaveLength(1);
  });

  it("launches once for concurrent starts of the same job", async () => {
    const results = await Promise.all([
      registry.startOrGet("same"),
      registry.startOrGet("same"),
      registry.startOrGet("same")
    ]);

    expect(invoker.launches).toHaveLength(1);
    expect(results.map((result) => result.started)).toEqual([true, false, false]);
    expect(new Set(results.map((result) => result.job.process.pid)).size).toBe(1);
  });

  it("relaunches a job whose previous run has exited", async () => {
    const first = await registry.startOrGet("abc-123");
    invoker.finish(0, 1);
    await first.job.process.exited;

    const second = await registry.startOrGet("abc-123");

    expect(second.started).toBe(true);
    expect(second.job.process.pid).not.toBe(first.job.process.pid);
    expect(registry.get("abc-123")).toBe(second.job);
  });

  it("keeps distinct jobs separate", async () => {
    await registry.startOrGet("a");
    await registry.startOrGet("b");

    expect(registry.get("a")?.id).toBe("a");
    expect(registry.get("b")?.id).toBe("b");
    expect(registry.get("a")?.process.pid).not.toBe(registry.get("b")?.process.pid);
    expect(registry.get("missing")).toBeUndefined();
  });

  it("leaves a new id unregistered when the launch fails", async () => {
    const failing = new JobRegistryService(
      new AppConfigService(),
      new FakeInvoker(() => {
        throw new InvocationError("Wrapper script not found at /opt/prover/prove-job.sh");
      })
    );

    await expect(failing.startOrGet("abc-123")).rejects.toBeInstanceOf(InvocationError);
    expect(failing.get("abc-123")).toBeUndefined();
  });

  it("keeps the previous run when a relaunch fails", async () => {
    let failNext = false;
    const flaky = new FakeInvoker(() => {
      if (failNext) {
        throw new InvocationError("Failed to launch /opt/prover/prove-job.sh for abc-123");
      }
    });
    const flakyRegistry = new JobRegistryService(new AppConfigService(), flaky);
    const { job } = await flakyRegistry.startOrGet("abc-123");
    flaky.finish(0, 1);
    await job.process.exited;

    failNext = true;
    await expect(flakyRegistry.startOrGet("abc-123")).rejects.toThrow(
      "Failed to launch /opt/prover/prove-job.sh for abc-123"
    );
    expect(flakyRegistry.get("abc-123")).toBe(job);
    expect(job.process.status()).toBe("Failed");
  });
});
