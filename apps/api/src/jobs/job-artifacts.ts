import { readFile } from "fs/promises";
import path from "path";

const INSTRUCTION_METRIC_MARKER = '"metric": "execute_metered_insns"';

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

export function parseInteger(raw: string): number | null {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    return null;
  }
  return Number(trimmed);
}

export async function readIntegerFile(filePath: string): Promise<number | null> {
  const raw = await readOptional(filePath);
  return raw === null ? null : parseInteger(raw);
}

/**
 * Finds the `execute_metered_insns` entry in a pretty-printed metrics dump and
 * reads the digits of the `"value"` line that follows it.
 */
export function scanInstructionMetric(metrics: string): number | null {
  const lines = metrics.split("\n");
  const index = lines.findIndex((line) => line.includes(INSTRUCTION_METRIC_MARKER));
  if (index === -1) {
    return null;
  }

  const next = lines[index + 1] ?? "";
  if (!next.includes('"value"')) {
    return null;
  }

  const digits = next.replace(/\D/g, "");
  return digits ? Number(digits) : 0;
}

export async function readInstructionCount(jobDir: string): Promise<number> {
  const direct = await readIntegerFile(path.join(jobDir, "num_instret"));
  if (direct !== null) {
    return direct;
  }

  const metrics = await readOptional(path.join(jobDir, "metrics.json"));
  if (metrics === null) {
    return 0;
  }
  return scanInstructionMetric(metrics) ?? 0;
}

export async function readLatencyMs(
  jobDir: string,
  fileNames: string[] = ["latency_ms.txt"]
): Promise<number | null> {
  for (const fileName of fileNames) {
    const value = await readIntegerFile(path.join(jobDir, fileName));
    if (value !== null) {
      return value;
    }
  }
  return null;
}

export function lastLines(content: string, count: number): string[] {
  if (count <= 0) {
    return [];
  }
  const lines = content.match(/[^\n]*\n|[^\n]+$/g) ?? [];
  return lines.slice(-count);
}

export async function tailFile(filePath: string, count: number): Promise<string[]> {
  const content = await readOptional(filePath);
  return content === null ? [] : lastLines(content, count);
}
