#!/usr/bin/env node
/**
 * Ranks ethproofs.org blocks by gas used and by proving time across provers.
 *
 *   ethproofs-analyzer                         1 page of 100 blocks, all metrics
 *   ethproofs-analyzer --pages 10 --size 50    10 pages of 50 blocks
 *   ethproofs-analyzer --file data.json        read a saved response instead
 *   ethproofs-analyzer --top-k 5 --metric median
 */
import { Command, Option } from "commander";
import { readFile } from "fs/promises";
import type { EthproofsBlock, MachineType } from "@blockprover/shared";
import {
  analyzeProvingTimes,
  ETHPROOFS_BLOCKS_URL,
  fetchBlockPages,
  parseBlocksPage,
  REPORT_METRICS,
  ReportMetric,
  renderProvingTimeReport
} from "../analysis/proving-times";
import { parseIntegerOption } from "./cli-options";

interface AnalyzerOptions {
  pages: number;
  size: number;
  file?: string;
  machineType: MachineType;
  topK: number;
  metric: ReportMetric;
}

const MACHINE_TYPES: MachineType[] = ["multi", "single"];

async function main(argv: string[]) {
  const program = new Command()
    .name("ethproofs-analyzer")
    .description("Analyze ethproofs.org block data to find top blocks by gas used and proving time")
    .option("-p, --pages <n>", "number of pages to fetch", parseIntegerOption, 1)
    .option("-s, --size <n>", "number of blocks per page", parseIntegerOption, 100)
    .option("-f, --file <path>", "load data from a JSON file instead of fetching")
    .addOption(
      new Option("-m, --machine-type <type>", "machine type filter")
        .choices(MACHINE_TYPES)
        .default("multi")
    )
    .option("-k, --top-k <n>", "number of top blocks to show per metric", parseIntegerOption, 1)
    .addOption(
      new Option("--metric <metric>", "which metric to show").choices(REPORT_METRICS).default("all")
    )
    .parse(argv);

  const options = program.opts<AnalyzerOptions>();

  console.log("\n# ETHPROOFS ANALYZER\n");

  let rows: EthproofsBlock[];
  if (options.file) {
    console.log(`**Source:** ${options.file}\n`);
    try {
      rows = parseBlocksPage(JSON.parse(await readFile(options.file, "utf-8"))).rows;
    } catch (error) {
      console.error(`Error: could not read ${options.file}: ${(error as Error).message}`);
      process.exitCode = 1;
      return;
    }
  } else {
    console.log(`**Source:** ${ETHPROOFS_BLOCKS_URL}  `);
    console.log(`**Config:** ${options.pages} × ${options.size} blocks, filter=${options.machineType}\n`);
    rows = (
      await fetchBlockPages(options.pages, options.size, options.machineType, (message) =>
        console.log(`  ${message}`)
      )
    ).rows;
    console.log();
  }

  const report = analyzeProvingTimes(rows, options.topK);
  for (const line of renderProvingTimeReport(report, options.topK, options.metric)) {
    console.log(line);
  }
}

main(process.argv).catch((error) => {
  console.error(`\nError: ${(error as Error).message}`);
  process.exit(1);
});
