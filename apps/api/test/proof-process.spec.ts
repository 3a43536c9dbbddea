import { EventEmitter } from "events";
import { ProofProcess } from "../src/jobs/proof-process";

describe("ProofProcess", () => {
  it("is in progress until the child exits", async () => {
    const child = new EventEmitter();
    const release = jest.fn();
    const proofProcess = new ProofProcess(child, 42, release);

    expect(proofProcess.status()).toBe("InProgress");
    expect(proofProcess.exitCode).toBeNull();

    child.emit("exit", 0, null);

    await expect(proofProcess.exited).resolves.toEqual({ exitCode: 0, signal: null });
    expect(proofProcess.status()).toBe("Completed");
    expect(release).toHaveBeenCalledTimes(1);
  });

  it("treats a signal as a failure", () => {
    const child = new EventEmitter();
    const proofProcess = new ProofProcess(child, 42);

    child.emit("exit", null, "SIGKILL");

    expect(proofProcess.signal).toBe("SIGKILL");
    expect(proofProcess.status()).toBe("Failed");
  });

  it("settles once when both error and exit fire", async () => {
    const child = new EventEmitter();
    const release = jest.fn();
    const proofProcess = new ProofProcess(child, 42, release);

    child.emit("error", new Error("EACCES"));
    child.emit("exit", 0, null);

    await expect(proofProcess.exited).resolves.toEqual({ exitCode: null, signal: null });
    expect(proofProcess.status()).toBe("Failed");
    expect(release).toHaveBeenCalledTimes(1);
  });

  it("keeps listening for errors after it has settled", async () => {
    const child = new EventEmitter();
    const proofProcess = new ProofProcess(child, 42);

    child.emit("exit", 1, null);

    expect(() => child.emit("error", new Error("kill EPERM"))).not.toThrow();
    await expect(proofProcess.exited).resolves.toEqual({ exitCode: 1, signal: null });
  });
});
