import { z } from "zod";
import { numberToHex } from "viem";
import { ChainClient, ChainTransportOptions, createChainClient } from "../chain/chain-client";

export const PRECOMPILES: Record<string, string> = {
  // Frontier
  "0x0000000000000000000000000000000000000001": "ecrecover",
  "0x0000000000000000000000000000000000000002": "sha256",
  "0x0000000000000000000000000000000000000003": "ripemd160",
  "0x0000000000000000000000000000000000000004": "identity",
  // Byzantium
  "0x0000000000000000000000000000000000000005": "modexp",
  "0x0000000000000000000000000000000000000006": "bn254_add",
  "0x0000000000000000000000000000000000000007": "bn254_mul",
  "0x0000000000000000000000000000000000000008": "bn254_pairing",
  // Istanbul
  "0x0000000000000000000000000000000000000009": "blake2f",
  // Cancun
  "0x000000000000000000000000000000000000000a": "kzg_point_eval",
  // Prague
  "0x000000000000000000000000000000000000000b": "bls12_g1_add",
  "0x000000000000000000000000000000000000000c": "bls12_g1_msm",
  "0x000000000000000000000000000000000000000d": "bls12_g2_add",
  "0x000000000000000000000000000000000000000e": "bls12_g2_msm",
  "0x000000000000000000000000000000000000000f": "bls12_pairing",
  "0x0000000000000000000000000000000000000010": "bls12_map_fp_to_g1",
  "0x0000000000000000000000000000000000000011": "bls12_map_fp2_to_g2",
  // Osaka
  "0x0000000000000000000000000000000000000100": "p256_verify"
};

const PRECOMPILE_NAMES = new Map(
  Object.values(PRECOMPILES).map((name) => [name.toLowerCase(), name])
);

const COL_RANK = 4;
const COL_TX = 66;
const COL_CALLS = 6;
const COL_PRECOMPILE = 22;

const SUMMARY_HEADER = `| ${"Precompile".padEnd(COL_PRECOMPILE)} | ${"Calls".padStart(COL_CALLS)} |`;
const SUMMARY_SEP = `|${"-".repeat(COL_PRECOMPILE + 2)}|${"-".repeat(COL_CALLS + 2)}|`;
const TX_HEADER = `| ${"Rank".padStart(COL_RANK)} | ${"Transaction".padEnd(COL_TX)} | ${"Calls".padStart(
  COL_CALLS
)} |`;
const TX_SEP = `|${"-".repeat(COL_RANK + 2)}|${"-".repeat(COL_TX + 2)}|${"-".repeat(COL_CALLS + 2)}|`;

export interface CallFrame {
  to?: string;
  calls?: CallFrame[];
}

const CallFrameSchema: z.ZodType<CallFrame> = z.lazy(() =>
  z.object({
    to: z.string().optional(),
    calls: z.array(CallFrameSchema).optional()
  })
);

const BlockTraceSchema = z.array(
  z.object({
    txHash: z.string().optional(),
    result: CallFrameSchema.optional()
  })
);

export type BlockTrace = z.infer<typeof BlockTraceSchema>;

export interface TxPrecompileStats {
  txHash: string;
  counts: Map<string, number>;
}

export function countPrecompileCalls(frame: CallFrame, counts: Map<string, number>): void {
  const name = PRECOMPILES[(frame.to ?? "").toLowerCase()];
  if (name) {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }

  for (const call of frame.calls ?? []) {
    countPrecompileCalls(call, counts);
  }
}

export function countCallFrames(frame: CallFrame): number {
  return (frame.calls ?? []).reduce((total, call) => total + countCallFrames(call), 1);
}

/** Per-transaction precompile counts; transactions without any are left out. */
export function analyzeTrace(trace: BlockTrace): TxPrecompileStats[] {
  const stats: TxPrecompileStats[] = [];
  for (const tx of trace) {
    const counts = new Map<string, number>();
    if (tx.result) {
      countPrecompileCalls(tx.result, counts);
    }
    if (counts.size > 0) {
      stats.push({ txHash: tx.txHash ?? "unknown", counts });
    }
  }
  return stats;
}

export function parseFilter(filter: string): string[] {
  const names: string[] = [];
  for (const part of filter.split(",")) {
    const trimmed = part.trim();
    if (!trimmed) {
      continue;
    }
    const normalized = PRECOMPILE_NAMES.get(trimmed.toLowerCase());
    if (!normalized) {
      const valid = Object.values(PRECOMPILES).sort().join(", ");
      throw new Error(`Invalid precompile name: ${trimmed}\nValid names: ${valid}`);
    }
    names.push(normalized);
  }
  return names;
}

export function filterTxStats(stats: TxPrecompileStats[], names: string[]): TxPrecompileStats[] {
  if (names.length === 0) {
    return stats;
  }

  const filtered: TxPrecompileStats[] = [];
  for (const { txHash, counts } of stats) {
    const kept = new Map(Array.from(counts).filter(([name]) => names.includes(name)));
    if (kept.size > 0) {
      filtered.push({ txHash, counts: kept });
    }
  }
  return filtered;
}

function sumCounts(counts: Map<string, number>): number {
  let total = 0;
  for (const count of counts.values()) {
    total += count;
  }
  return total;
}

export function summarizePrecompiles(
  stats: TxPrecompileStats[],
  names: string[] = []
): { totals: [string, number][]; total: number } {
  const totals = new Map<string, number>();
  for (const { counts } of filterTxStats(stats, names)) {
    for (const [name, count] of counts) {
      totals.set(name, (totals.get(name) ?? 0) + count);
    }
  }

  return {
    totals: Array.from(totals).sort((a, b) => b[1] - a[1]),
    total: sumCounts(totals)
  };
}

export function topTransactions(
  stats: TxPrecompileStats[],
  topK: number,
  names: string[] = []
): { txHash: string; calls: number }[] {
  return filterTxStats(stats, names)
    .map(({ txHash, counts }) => ({ txHash, calls: sumCounts(counts) }))
    .sort((a, b) => b.calls - a.calls)
    .slice(0, Math.max(topK, 0));
}

export function renderPrecompileReport(
  stats: TxPrecompileStats[],
  block: number,
  topK: number,
  names: string[] = []
): string[] {
  const { totals, total } = summarizePrecompiles(stats, names);
  const filterLabel = names.join(", ");
  const lines = [
    names.length > 0 ? `## Block ${block} Summary (filtered: ${filterLabel})` : `## Block ${block} Summary`,
    "",
    SUMMARY_HEADER,
    SUMMARY_SEP
  ];

  for (const [name, count] of totals) {
    if (count > 0) {
      lines.push(`| ${name.padEnd(COL_PRECOMPILE)} | ${String(count).padStart(COL_CALLS)} |`);
    }
  }
  lines.push(SUMMARY_SEP, `| ${"Total".padEnd(COL_PRECOMPILE)} | ${String(total).padStart(COL_CALLS)} |`);

  const top = topTransactions(stats, topK, names);
  lines.push(
    "",
    names.length > 0
      ? `## Top ${top.length} Transactions using ${filterLabel}`
      : `## Top ${top.length} Transactions by Precompile Calls`,
    "",
    TX_HEADER,
    TX_SEP
  );
  top.forEach(({ txHash, calls }, index) => {
    lines.push(
      `| ${String(index + 1).padStart(COL_RANK)} | ${txHash.padEnd(COL_TX)} | ${String(calls).padStart(
        COL_CALLS
      )} |`
    );
  });

  return lines;
}

/** Block traces are slow: wait up to two minutes and send the request once. */
export const TRACE_TRANSPORT_OPTIONS: ChainTransportOptions = { timeout: 120_000, retryCount: 0 };

export function createTraceClient(rpcUrl: string): ChainClient {
  return createChainClient(rpcUrl, TRACE_TRANSPORT_OPTIONS);
}

export function parseBlockTrace(result: unknown): BlockTrace {
  return BlockTraceSchema.parse(result ?? []);
}

export async function traceBlock(client: ChainClient, block: number): Promise<BlockTrace> {
  const result = await client.request({
    method: "debug_traceBlockByNumber",
    params: [numberToHex(block), { tracer: "callTracer" }]
  });
  return parseBlockTrace(result);
}
