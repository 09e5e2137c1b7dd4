/**
 * RpcClient: JSON-RPC 2.0 over HTTP with a per-call timeout, typed errors,
 * and opt-in rate-limit retry.
 *
 * Features:
 * - 30s timeout per call (a timeout fails only that call)
 * - Error taxonomy: method_not_found / rpc_error / 429_rate_limit / timeout / network / invalid_response
 * - Exponential backoff with jitter for 429s when retries are enabled
 * - Results validated with zod schemas instead of trusted blindly
 *
 * Never silently swallows errors - always returns a result or throws RpcError.
 */

import { FetchRequest, isError } from 'ethers';
import type { z } from 'zod';

import { recordRpcCall } from '../metrics/index.js';
import { createComponentLogger, maskUrl } from '../utils/logger.js';
import {
  jsonRpcResponseSchema,
  type JsonRpcErrorObject,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from './types.js';

const logger = createComponentLogger('rpc-client');

export const DEFAULT_RPC_TIMEOUT_MS = 30_000;

/** JSON-RPC "method not found" */
export const METHOD_NOT_FOUND_CODE = -32601;

export type RpcErrorType =
  | 'method_not_found'
  | 'rpc_error'
  | '429_rate_limit'
  | 'timeout'
  | 'network'
  | 'invalid_response'
  | 'unknown';

export class RpcError extends Error {
  constructor(
    public readonly type: RpcErrorType,
    message: string,
    public readonly rpcError?: JsonRpcErrorObject,
    public readonly underlyingError?: unknown
  ) {
    super(message);
    this.name = 'RpcError';
  }
}

/**
 * Moves one JSON-RPC request to a node and returns the raw envelope.
 * Transport failures (timeouts, refused connections) throw.
 */
export interface JsonRpcTransport {
  readonly url: string;
  send(request: JsonRpcRequest): Promise<JsonRpcResponse>;
}

export class HttpJsonRpcTransport implements JsonRpcTransport {
  constructor(
    public readonly url: string,
    private readonly timeoutMs: number = DEFAULT_RPC_TIMEOUT_MS
  ) {}

  async send(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    const req = new FetchRequest(this.url);
    req.method = 'POST';
    req.timeout = this.timeoutMs;
    req.body = request;
    // Rate limiting is handled by RpcClient, not by FetchRequest's built-in throttle
    req.setThrottleParams({ maxAttempts: 1 });

    const response = await req.send();

    let body: unknown;
    try {
      body = JSON.parse(response.bodyText);
    } catch (error) {
      if (response.statusCode === 429) {
        throw new RpcError('429_rate_limit', `HTTP 429 from ${maskUrl(this.url)}`, undefined, error);
      }
      throw new RpcError(
        'invalid_response',
        `Invalid JSON response (HTTP ${response.statusCode}) for ${request.method}`,
        undefined,
        error
      );
    }

    const parsed = jsonRpcResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RpcError(
        'invalid_response',
        `Malformed JSON-RPC envelope for ${request.method}: ${parsed.error.message}`
      );
    }
    return parsed.data;
  }
}

export interface RpcClientOptions {
  transport?: JsonRpcTransport;
  timeoutMs?: number;
  maxRetries?: number;
  baseBackoffMs?: number;
  maxBackoffMs?: number;
}

export class RpcClient {
  private readonly transport: JsonRpcTransport;
  private readonly maxRetries: number;
  private readonly baseBackoffMs: number;
  private readonly maxBackoffMs: number;
  private nextId = 1;

  constructor(url: string, options: RpcClientOptions = {}) {
    this.transport = options.transport ?? new HttpJsonRpcTransport(url, options.timeoutMs);
    this.maxRetries = options.maxRetries ?? 0;
    this.baseBackoffMs = options.baseBackoffMs ?? 100;
    this.maxBackoffMs = options.maxBackoffMs ?? 5000;
  }

  get url(): string {
    return this.transport.url;
  }

  /**
   * Send a request and return the raw envelope. Transport-level failures
   * still throw RpcError; JSON-RPC errors are returned, not thrown.
   */
  async request(method: string, params: unknown[]): Promise<JsonRpcResponse> {
    const request: JsonRpcRequest = { jsonrpc: '2.0', id: this.nextId++, method, params };

    for (let attempt = 0; ; attempt++) {
      try {
        const response = await this.transport.send(request);
        recordRpcCall(method, response.error ? 'rpc_error' : 'ok');
        return response;
      } catch (err) {
        const classified = this.classifyError(err, method);
        recordRpcCall(method, classified.type);

        if (classified.type === '429_rate_limit' && attempt < this.maxRetries) {
          const backoffMs = this.calculateBackoff(attempt);
          logger.warn(
            `[${method}] ${maskUrl(this.url)}: rate limited (attempt ${attempt + 1}/${this.maxRetries + 1}), retrying in ${Math.round(backoffMs)}ms`
          );
          await this.sleep(backoffMs);
          continue;
        }
        throw classified;
      }
    }
  }

  /**
   * Execute an RPC call and validate its result.
   *
   * @throws RpcError when the node returns an error or the result does not match the schema
   */
  async call<S extends z.ZodTypeAny>(method: string, params: unknown[], schema: S): Promise<z.output<S>> {
    const response = await this.request(method, params);

    if (response.error) {
      throw RpcClient.fromRpcError(method, response.error);
    }

    const parsed = schema.safeParse(response.result);
    if (!parsed.success) {
      throw new RpcError(
        'invalid_response',
        `Unexpected result shape for ${method}: ${parsed.error.issues[0]?.message ?? 'invalid'}`
      );
    }
    return parsed.data;
  }

  static fromRpcError(method: string, error: JsonRpcErrorObject): RpcError {
    const type: RpcErrorType = error.code === METHOD_NOT_FOUND_CODE ? 'method_not_found' : 'rpc_error';
    return new RpcError(type, `${method} failed: ${error.message} (code ${error.code})`, error);
  }

  /**
   * Classify a transport error into a typed category
   */
  private classifyError(err: unknown, method: string): RpcError {
    if (err instanceof RpcError) {
      return err;
    }

    const errString = String(err);
    const errMessage = err instanceof Error ? err.message : errString;

    if (isError(err, 'TIMEOUT') || errString.includes('timeout') || errString.includes('timed out')) {
      return new RpcError('timeout', `${method} timed out: ${errMessage}`, undefined, err);
    }

    if (errString.includes('429') || errString.includes('rate limit')) {
      return new RpcError('429_rate_limit', `Rate limit exceeded: ${errMessage}`, undefined, err);
    }

    if (
      errString.includes('ETIMEDOUT') ||
      errString.includes('ECONNREFUSED') ||
      errString.includes('ENOTFOUND') ||
      errString.includes('ECONNRESET') ||
      errString.includes('network')
    ) {
      return new RpcError('network', `Network error: ${errMessage}`, undefined, err);
    }

    return new RpcError('unknown', `RPC error: ${errMessage}`, undefined, err);
  }

  /**
   * Calculate exponential backoff with jitter
   */
  private calculateBackoff(attempt: number): number {
    const exponential = Math.min(
      this.baseBackoffMs * Math.pow(2, attempt),
      this.maxBackoffMs
    );
    const jitter = Math.random() * this.baseBackoffMs;
    return exponential + jitter;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

/**
 * Format a block number the way JSON-RPC expects it
 */
export function toBlockTag(blockNumber: number): string {
  return `0x${blockNumber.toString(16)}`;
}
