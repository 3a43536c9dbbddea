import {
  analyzeTrace,
  BlockTrace,
  countCallFrames,
  filterTxStats,
  parseBlockTrace,
  parseFilter,
  renderPrecompileReport,
  summarizePrecompiles,
  topTransactions
} from "../src/analysis/precompiles";

const ECRECOVER = "0x0000000000000000000000000000000000000001";
const SHA256 = "0x0000000000000000000000000000000000000002";

const trace: BlockTrace = [
  {
    txHash: "0xaaa",
    result: {
      to: "0x00000000000000000000000000000000000000ab",
      calls: [{ to: ECRECOVER }, { to: SHA256, calls: [{ to: ECRECOVER }] }]
    }
  },
  { txHash: "0xbbb", result: { to: "0x00000000000000000000000000000000000000cd" } },
  { txHash: "0xccc", result: { to: "0x000000000000000000000000000000000000000A" } }
];

describe("precompile analysis", () => {
  it("counts nested precompile calls per transaction", () => {
    expect(analyzeTrace(trace)).toEqual([
      {
        txHash: "0xaaa",
        counts: new Map([
          ["ecrecover", 2],
          ["sha256", 1]
        ])
      },
      { txHash: "0xccc", counts: new Map([["kzg_point_eval", 1]]) }
    ]);
  });

  it("counts every frame of a call tree", () => {
    const [first] = trace;
    expect(first.result && countCallFrames(first.result)).toBe(4);
  });

  it("summarizes totals in descending order", () => {
    expect(summarizePrecompiles(analyzeTrace(trace))).toEqual({
      totals: [
        ["ecrecover", 2],
        ["sha256", 1],
        ["kzg_point_eval", 1]
      ],
      total: 4
    });
  });

  it("ranks transactions by precompile calls", () => {
    expect(topTransactions(analyzeTrace(trace), 1)).toEqual([{ txHash: "0xaaa", calls: 3 }]);
    expect(topTransactions(analyzeTrace(trace), 0)).toEqual([]);
  });

  it("parses filters case-insensitively", () => {
    expect(parseFilter(" ECRecover , sha256,,")).toEqual(["ecrecover", "sha256"]);
    expect(() => parseFilter("sha3")).toThrow("Invalid precompile name: sha3\nValid names: ");
  });

  it("drops transactions without a filtered precompile", () => {
    expect(filterTxStats(analyzeTrace(trace), ["sha256"])).toEqual([
      { txHash: "0xaaa", counts: new Map([["sha256", 1]]) }
    ]);
  });

  it("renders a filtered report", () => {
    const lines = renderPrecompileReport(analyzeTrace(trace), 23946500, 5, ["sha256"]);

    expect(lines).toEqual([
      "## Block 23946500 Summary (filtered: sha256)",
      "",
      "| Precompile             |  Calls |",
      "|------------------------|--------|",
      "| sha256                 |      1 |",
      "|------------------------|--------|",
      "| Total                  |      1 |",
      "",
      "## Top 1 Transactions using sha256",
      "",
      `| Rank | ${"Transaction".padEnd(66)} |  Calls |`,
      `|------|${"-".repeat(68)}|--------|`,
      `|    1 | ${"0xaaa".padEnd(66)} |      1 |`
    ]);
  });

  it("validates trace responses", () => {
    expect(parseBlockTrace(null)).toEqual([]);
    expect(parseBlockTrace([{ txHash: "0x1", result: { to: ECRECOVER, calls: [] } }])).toEqual([
      { txHash: "0x1", result: { to: ECRECOVER, calls: [] } }
    ]);
    expect(() => parseBlockTrace({ error: "not an array" })).toThrow();
  });
});
