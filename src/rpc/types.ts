/**
 * JSON-RPC 2.0 envelope and the node response shapes the backtester reads.
 * Only consumed fields are declared; unknown keys are stripped by zod.
 */

import { z } from 'zod';

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: number;
  method: string;
  params: unknown[];
}

export const jsonRpcErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const jsonRpcResponseSchema = z.object({
  jsonrpc: z.string().optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: jsonRpcErrorSchema.optional(),
});

export type JsonRpcErrorObject = z.infer<typeof jsonRpcErrorSchema>;
export type JsonRpcResponse = z.infer<typeof jsonRpcResponseSchema>;

const quantity = z.string();

export const rpcTransactionSchema = z.object({
  hash: z.string(),
  from: z.string(),
  to: z.string().nullable().optional(),
  value: quantity,
  input: z.string(),
  transactionIndex: quantity,
  gasPrice: quantity.nullable().optional(),
  gas: quantity.nullable().optional(),
  maxFeePerGas: quantity.nullable().optional(),
  maxPriorityFeePerGas: quantity.nullable().optional(),
  blockNumber: quantity.nullable().optional(),
});

export type RpcTransaction = z.infer<typeof rpcTransactionSchema>;

/** eth_getBlockByNumber(tag, true) */
export const fullBlockSchema = z.object({
  number: quantity,
  hash: z.string().nullable().optional(),
  baseFeePerGas: quantity.nullable().optional(),
  transactions: z.array(rpcTransactionSchema),
}).nullable();

/** eth_getBlockByNumber(tag, false) */
export const hashBlockSchema = z.object({
  number: quantity,
  baseFeePerGas: quantity.nullable().optional(),
  transactions: z.array(z.string()),
}).nullable();

export type RpcBlock = NonNullable<z.infer<typeof fullBlockSchema>>;

/**
 * callTracer frame (geth, erigon, reth and anvil share this layout)
 */
export interface CallFrame {
  type: string;
  from: string;
  to?: string;
  value?: string;
  gas?: string;
  gasUsed?: string;
  input?: string;
  output?: string;
  error?: string;
  revertReason?: string;
  calls?: CallFrame[];
}

export const callFrameSchema: z.ZodType<CallFrame> = z.lazy(() =>
  z.object({
    type: z.string(),
    from: z.string(),
    to: z.string().optional(),
    value: z.string().optional(),
    gas: z.string().optional(),
    gasUsed: z.string().optional(),
    input: z.string().optional(),
    output: z.string().optional(),
    error: z.string().optional(),
    revertReason: z.string().optional(),
    calls: z.array(callFrameSchema).optional(),
  })
);

/**
 * debug_traceBlockByNumber with callTracer. Older geth releases omit
 * txHash, leaving only positional alignment with the block's transactions.
 */
export const blockTraceSchema = z.array(
  z.object({
    txHash: z.string().optional(),
    result: callFrameSchema.nullable().optional(),
    error: z.string().optional(),
  })
);

/**
 * trace_filter (parity/erigon trace format)
 */
export const filterTraceSchema = z.array(
  z.object({
    action: z.object({
      from: z.string().optional(),
      to: z.string().nullable().optional(),
      callType: z.string().optional(),
    }),
    blockNumber: z.number(),
    transactionHash: z.string().nullable().optional(),
    transactionPosition: z.number().nullable().optional(),
    type: z.string(),
  })
);
