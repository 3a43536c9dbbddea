import { z } from "zod";
import type { EthproofsBlock, EthproofsBlocksPage, MachineType } from "@blockprover/shared";

export const ETHPROOFS_BLOCKS_URL = "https://ethproofs.org/api/blocks";

export type TimeMetric = "max" | "median" | "avg" | "min";
export type ReportMetric = "all" | "gas" | TimeMetric;

export const REPORT_METRICS: ReportMetric[] = ["all", "gas", "max", "median", "avg", "min"];

const COL_RANK = 4;
const COL_BLOCK = 10;
const COL_GAS = 14;
const COL_TXS = 5;
const COL_TIME = 13;
const COL_TIMESTAMP = 19;

const GAS_TABLE_HEADER = `| ${"Rank".padStart(COL_RANK)} | ${"Block".padEnd(COL_BLOCK)} | ${"Gas".padStart(
  COL_GAS
)} | ${"Txs".padStart(COL_TXS)} | ${"Timestamp".padEnd(COL_TIMESTAMP)} |`;
const GAS_TABLE_SEP = `|${"-".repeat(COL_RANK + 2)}|${"-".repeat(COL_BLOCK + 2)}|${"-".repeat(
  COL_GAS + 2
)}|${"-".repeat(COL_TXS + 2)}|${"-".repeat(COL_TIMESTAMP + 2)}|`;
const TIME_TABLE_SEP = `|${"-".repeat(COL_RANK + 2)}|${"-".repeat(COL_BLOCK + 2)}|${"-".repeat(
  COL_TIME + 2
)}|${"-".repeat(COL_GAS + 2)}|${"-".repeat(COL_TXS + 2)}|`;

const TIME_SECTIONS: { metric: TimeMetric; title: string; label: string }[] = [
  { metric: "max", title: "MAX", label: "Max" },
  { metric: "median", title: "MEDIAN", label: "Median" },
  { metric: "avg", title: "AVG", label: "Avg" },
  { metric: "min", title: "MIN", label: "Min" }
];

const BlocksPageSchema = z.object({
  rows: z
    .array(
      z
        .object({
          block_number: z.number(),
          gas_used: z.number().nullish(),
          transaction_count: z.number().nullish(),
          timestamp: z.string().nullish(),
          proofs: z.array(z.object({ proving_time: z.number().nullish() }).passthrough()).optional()
        })
        .passthrough()
    )
    .default([])
});

export interface BlockTimeStats {
  block: EthproofsBlock;
  provingTimes: number[];
  max: number;
  median: number;
  avg: number;
  min: number;
}

export interface ProvingTimeReport {
  rowCount: number;
  blocksWithGas: number;
  totalProofs: number;
  topGas: { block: EthproofsBlock; gasUsed: number }[];
  topTime: Record<TimeMetric, BlockTimeStats[]>;
}

export function parseBlocksPage(data: unknown): EthproofsBlocksPage {
  return BlocksPageSchema.parse(data);
}

export function computeBlockTimeStats(block: EthproofsBlock): BlockTimeStats | null {
  const provingTimes = (block.proofs ?? [])
    .map((proof) => proof.proving_time)
    .filter((time): time is number => time !== null && time !== undefined);
  if (provingTimes.length === 0) {
    return null;
  }

  const sorted = [...provingTimes].sort((a, b) => a - b);
  const n = sorted.length;
  const median = n % 2 === 0 ? (sorted[n / 2 - 1] + sorted[n / 2]) / 2 : sorted[(n - 1) / 2];

  return {
    block,
    provingTimes,
    max: sorted[n - 1],
    median,
    avg: sorted.reduce((sum, time) => sum + time, 0) / n,
    min: sorted[0]
  };
}

function topBy<T>(items: T[], score: (item: T) => number, k: number): T[] {
  return [...items].sort((a, b) => score(b) - score(a)).slice(0, Math.max(k, 0));
}

export function analyzeProvingTimes(rows: EthproofsBlock[], topK: number): ProvingTimeReport {
  const withGas: { block: EthproofsBlock; gasUsed: number }[] = [];
  const stats: BlockTimeStats[] = [];

  for (const block of rows) {
    if (block.gas_used !== null && block.gas_used !== undefined) {
      withGas.push({ block, gasUsed: block.gas_used });
    }
    const blockStats = computeBlockTimeStats(block);
    if (blockStats) {
      stats.push(blockStats);
    }
  }

  return {
    rowCount: rows.length,
    blocksWithGas: withGas.length,
    totalProofs: stats.reduce((sum, entry) => sum + entry.provingTimes.length, 0),
    topGas: topBy(withGas, (entry) => entry.gasUsed, topK),
    topTime: {
      max: topBy(stats, (entry) => entry.max, topK),
      median: topBy(stats, (entry) => entry.median, topK),
      avg: topBy(stats, (entry) => entry.avg, topK),
      min: topBy(stats, (entry) => entry.min, topK)
    }
  };
}

export function formatTimestamp(timestamp: string | null | undefined): string {
  if (timestamp && timestamp.length > 19) {
    return timestamp.slice(0, 19);
  }
  return timestamp || "N/A";
}

export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

export function formatGas(gas: number | null | undefined): string {
  return gas ? gas.toLocaleString("en-US") : "N/A";
}

function timeTableHeader(label: string): string {
  const column = `Time (${label})`;
  return `| ${"Rank".padStart(COL_RANK)} | ${"Block".padEnd(COL_BLOCK)} | ${column.padEnd(
    COL_TIME
  )} | ${"Gas".padStart(COL_GAS)} | ${"Txs".padStart(COL_TXS)} |`;
}

export function renderProvingTimeReport(
  report: ProvingTimeReport,
  topK: number,
  metric: ReportMetric
): string[] {
  if (report.rowCount === 0) {
    return ["No blocks found in the response."];
  }

  const lines = [
    `Fetched ${report.rowCount.toLocaleString("en-US")} blocks (${report.blocksWithGas.toLocaleString(
      "en-US"
    )} with gas, ${report.totalProofs.toLocaleString("en-US")} proofs)`,
    ""
  ];

  if (metric === "all" || metric === "gas") {
    lines.push(`## Top ${topK} by Gas Used`, "");
    if (report.topGas.length === 0) {
      lines.push("No blocks with gas data found");
    } else {
      lines.push(GAS_TABLE_HEADER, GAS_TABLE_SEP);
      report.topGas.forEach(({ block, gasUsed }, index) => {
        lines.push(
          `| ${String(index + 1).padStart(COL_RANK)} | ${String(block.block_number).padEnd(
            COL_BLOCK
          )} | ${formatGas(gasUsed).padStart(COL_GAS)} | ${String(
            block.transaction_count ?? "N/A"
          ).padStart(COL_TXS)} | ${formatTimestamp(block.timestamp).padEnd(COL_TIMESTAMP)} |`
        );
      });
    }
  }

  if (metric === "gas") {
    return lines;
  }

  if (report.topTime.max.length === 0) {
    lines.push("", "No proofs with proving time data found");
    return lines;
  }

  for (const section of TIME_SECTIONS) {
    if (metric !== "all" && metric !== section.metric) {
      continue;
    }
    lines.push("", `## Top ${topK} by ${section.title} Proving Time`, "");
    lines.push(timeTableHeader(section.label), TIME_TABLE_SEP);
    report.topTime[section.metric].forEach((entry, index) => {
      const { block } = entry;
      lines.push(
        `| ${String(index + 1).padStart(COL_RANK)} | ${String(block.block_number).padEnd(
          COL_BLOCK
        )} | ${formatSeconds(entry[section.metric]).padEnd(COL_TIME)} | ${formatGas(
          block.gas_used
        ).padStart(COL_GAS)} | ${String(block.transaction_count || "N/A").padStart(COL_TXS)} |`
      );
    });
  }

  return lines;
}

export async function fetchBlocksPage(
  pageIndex: number,
  pageSize: number,
  machineType: MachineType,
  baseUrl = ETHPROOFS_BLOCKS_URL
): Promise<EthproofsBlocksPage> {
  const url = new URL(baseUrl);
  url.searchParams.set("page_index", String(pageIndex));
  url.searchParams.set("page_size", String(pageSize));
  url.searchParams.set("machine_type", machineType);

  const res = await fetch(url, { signal: AbortSignal.timeout(30_000) });
  if (!res.ok) {
    throw new Error(`Request failed: ${res.status}`);
  }
  return parseBlocksPage(await res.json());
}

/**
 * Fetches up to `pages` pages, stopping early on a short page or a failed
 * request. Rows gathered before a failure are kept.
 */
export async function fetchBlockPages(
  pages: number,
  pageSize: number,
  machineType: MachineType,
  onProgress: (message: string) => void = () => undefined,
  fetchPage: typeof fetchBlocksPage = fetchBlocksPage
): Promise<EthproofsBlocksPage> {
  const rows: EthproofsBlock[] = [];

  for (let pageIndex = 0; pageIndex < pages; pageIndex++) {
    onProgress(`Fetching page ${pageIndex + 1}/${pages}...`);
    try {
      const page = await fetchPage(pageIndex, pageSize, machineType);
      rows.push(...page.rows);
      if (page.rows.length < pageSize) {
        onProgress(
          `Fetched ${rows.length.toLocaleString("en-US")} blocks (${pageIndex + 1} pages, reached end of data)`
        );
        return { rows };
      }
    } catch (error) {
      onProgress(`Error on page ${pageIndex + 1}: ${(error as Error).message}`);
      return { rows };
    }
  }

  onProgress(`Fetched ${rows.length.toLocaleString("en-US")} blocks (${pages} pages)`);
  return { rows };
}
