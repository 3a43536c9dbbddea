#!/usr/bin/env node
/**
 * Counts precompile calls in a block via debug_traceBlockByNumber (callTracer).
 *
 *   precompile-analyzer 21000000 --rpc http://localhost:8545
 *   precompile-analyzer 21000000 --top-k 10 --filter bn254_add,bn254_mul
 *   precompile-analyzer --check
 */
import { Command } from "commander";
import type { ChainClient } from "../chain/chain-client";
import {
  analyzeTrace,
  countCallFrames,
  createTraceClient,
  parseFilter,
  renderPrecompileReport,
  traceBlock
} from "../analysis/precompiles";
import { parseIntegerOption } from "./cli-options";

const DEFAULT_RPC_URL = "http://localhost:8545";
const DEFAULT_TOP_K = 5;

interface PrecompileOptions {
  rpc: string;
  check?: boolean;
  verbose?: boolean;
  topK: number;
  filter?: string;
}

async function checkRpc(client: ChainClient): Promise<boolean> {
  console.log("Checking for debug_traceBlockByNumber support...");
  try {
    const head = Number(await client.getBlockNumber());
    console.log(`  eth_blockNumber: ${head}`);

    const trace = await traceBlock(client, head - 100);
    console.log(`  debug_traceBlockByNumber: OK (${trace.length} transactions)`);
    return true;
  } catch (error) {
    console.log(`  Error: ${(error as Error).message}`);
    return false;
  }
}

async function main(argv: string[]) {
  const program: Command = new Command()
    .name("precompile-analyzer")
    .description("Analyze precompile calls in Ethereum blocks using debug_traceBlockByNumber")
    .argument("[block]", "block number to analyze", parseIntegerOption)
    .option("--rpc <url>", "RPC endpoint URL", DEFAULT_RPC_URL)
    .option("--check", "check if the RPC endpoint supports debug_traceBlockByNumber")
    .option("-v, --verbose", "print debug information about the trace response")
    .option("-k, --top-k <n>", "number of top transactions to show", parseIntegerOption, DEFAULT_TOP_K)
    .option("-f, --filter <names>", "filter by precompile name(s), comma-separated")
    .parse(argv);

  const options = program.opts<PrecompileOptions>();
  const block: number | undefined = program.processedArgs[0];
  const client = createTraceClient(options.rpc);

  if (options.check) {
    process.exitCode = (await checkRpc(client)) ? 0 : 1;
    return;
  }

  if (block === undefined) {
    program.error("block number is required (or use --check)");
  }

  let names: string[] = [];
  if (options.filter) {
    try {
      names = parseFilter(options.filter);
    } catch (error) {
      program.error((error as Error).message);
    }
  }

  console.log("\n# PRECOMPILE ANALYZER\n");
  console.log(`**Block:** ${block}\n`);

  const trace = await traceBlock(client, block);
  if (options.verbose) {
    const frames = trace.reduce((total, tx) => total + (tx.result ? countCallFrames(tx.result) : 0), 0);
    console.log(`  Transactions: ${trace.length}, Call frames: ${frames}`);
  }

  const stats = analyzeTrace(trace);
  if (stats.length === 0) {
    console.log("No precompile calls found in this block.");
    return;
  }

  for (const line of renderPrecompileReport(stats, block, options.topK, names)) {
    console.log(line);
  }
}

main(process.argv).catch((error) => {
  console.error(`\nError: ${(error as Error).message}`);
  process.exit(1);
});
