import path from "path";

export const PROVING_INTERVAL = 100;

export function boundaryFor(head: number, interval = PROVING_INTERVAL): number {
  return Math.floor(head / interval) * interval;
}

export function blocksUntilNextBoundary(head: number, interval = PROVING_INTERVAL): number {
  return interval - (head % interval);
}

/** Rough time until the head reaches the next boundary, at a fixed block time. */
export function estimateWaitMs(
  head: number,
  blockTimeSeconds: number,
  interval = PROVING_INTERVAL
): number {
  return blocksUntilNextBoundary(head, interval) * blockTimeSeconds * 1000;
}

export function blockWorkDir(jobsDir: string, block: number, configTag: string): string {
  return path.join(jobsDir, `output-${block}-${configTag}`);
}
