/**
 * Sentinel-delimited wire format shared by the fetch-transactions CLI and
 * the Solidity FFI consumers that read its stdout.
 *
 *   TRANSACTION_DATA:START
 *   TRANSACTION_DATA:<payload>TRANSACTION_DATA:END
 */

import type { TransactionRecord } from '../backtest/types.js';

export const TRANSACTION_DATA_MARKER = 'TRANSACTION_DATA:';
export const BLOCK_SUMMARY_MARKER = 'BLOCK_SUMMARY_FORMATTED:';

/** Fields per record in the extended layout (hash .. maxPriorityFeePerGas) */
export const EXTENDED_RECORD_FIELDS = 11;
/** Fields per record in the legacy layout (hash .. gasPrice) */
export const LEGACY_RECORD_FIELDS = 8;

export type OutputFormat = 'simple' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['simple', 'json'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

/**
 * `count|hash|from|to|value|data|blockNumber|txIndex|gasPrice|gasLimit|maxFeePerGas|maxPriorityFeePerGas|...`
 */
export function encodeSimpleFormat(records: readonly TransactionRecord[]): string {
  const fields: string[] = [String(records.length)];
  for (const record of records) {
    fields.push(
      record.hash,
      record.from,
      record.to,
      record.value.toString(),
      record.data,
      String(record.blockNumber),
      String(record.transactionIndex),
      record.gasPrice.toString(),
      record.gasLimit.toString(),
      record.maxFeePerGas.toString(),
      record.maxPriorityFeePerGas.toString()
    );
  }
  return fields.join('|');
}

export interface JsonWireRecord {
  hash: string;
  from: string;
  to: string;
  value: string;
  data: string;
  block_number: string;
  transaction_index: string;
  gas_price: string;
  gas_limit: string;
  max_fee_per_gas: string;
  max_priority_fee_per_gas: string;
}

export function toJsonWireRecord(record: TransactionRecord): JsonWireRecord {
  return {
    hash: record.hash,
    from: record.from,
    to: record.to,
    value: record.value.toString(),
    data: record.data,
    block_number: String(record.blockNumber),
    transaction_index: String(record.transactionIndex),
    gas_price: record.gasPrice.toString(),
    gas_limit: record.gasLimit.toString(),
    max_fee_per_gas: record.maxFeePerGas.toString(),
    max_priority_fee_per_gas: record.maxPriorityFeePerGas.toString(),
  };
}

export function encodeJsonFormat(records: readonly TransactionRecord[]): string {
  return JSON.stringify(records.map(toJsonWireRecord));
}

export function encodePayload(records: readonly TransactionRecord[], format: OutputFormat): string {
  return format === 'json' ? encodeJsonFormat(records) : encodeSimpleFormat(records);
}

/**
 * Wrap a payload in the START/END sentinels
 */
export function wrapTransactionData(payload: string): string {
  return `${TRANSACTION_DATA_MARKER}START\n${TRANSACTION_DATA_MARKER}${payload}${TRANSACTION_DATA_MARKER}END`;
}

/**
 * Substring between the 2nd and 3rd marker occurrences, trailing
 * whitespace trimmed. Empty when fewer than three markers are present.
 */
export function extractDataLine(output: string): string {
  const positions: number[] = [];
  let from = 0;
  while (positions.length < 3) {
    const index = output.indexOf(TRANSACTION_DATA_MARKER, from);
    if (index === -1) break;
    positions.push(index);
    from = index + TRANSACTION_DATA_MARKER.length;
  }

  if (positions.length < 3) {
    return '';
  }

  const [, second, third] = positions;
  return output.slice(second + TRANSACTION_DATA_MARKER.length, third).trimEnd();
}

export interface BlockSummaryLine {
  blockNumber: number;
  triggered: number;
  total: number;
  /** Set when the block could not be fetched */
  skipped?: string;
}

export function formatBlockSummaryLine({ blockNumber, triggered, total, skipped }: BlockSummaryLine): string {
  if (skipped !== undefined) {
    return `=== BLOCK ${blockNumber} | SKIPPED: ${skipped} ===`;
  }
  if (triggered > 0) {
    return `=== BLOCK ${blockNumber} SUMMARY | Triggered: ${triggered} | Not Triggered: ${total - triggered} | Total: ${total} ===`;
  }
  return `=== BLOCK ${blockNumber} | Total TXs: ${total} ===`;
}

export function formatBlockSummaries(blocks: readonly BlockSummaryLine[]): string {
  const lines = [
    `${BLOCK_SUMMARY_MARKER}START`,
    ...blocks.map(formatBlockSummaryLine),
    `${BLOCK_SUMMARY_MARKER}END`,
  ];
  return lines.join('\n');
}
