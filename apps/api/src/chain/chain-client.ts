import { createPublicClient, http, rpcSchema, type Hex, type HttpTransportConfig } from "viem";

type TraceRpcSchema = [
  {
    Method: "debug_traceBlockByNumber";
    Parameters: [Hex, { tracer: "callTracer" }];
    ReturnType: unknown;
  }
];

export type ChainTransportOptions = Pick<HttpTransportConfig, "timeout" | "retryCount">;

export function createChainClient(rpcUrl: string, transport: ChainTransportOptions = {}) {
  return createPublicClient({
    transport: http(rpcUrl, transport),
    rpcSchema: rpcSchema<TraceRpcSchema>()
  });
}

export type ChainClient = ReturnType<typeof createChainClient>;
