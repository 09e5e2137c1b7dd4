/**
 * Decoder for the pipe-delimited transaction payload.
 *
 * Two record layouts are accepted: the extended one (11 fields, gas fields
 * included) and the legacy one (8 fields, gas fields read as 0).
 */

import { z } from 'zod';

import type { TransactionRecord } from '../backtest/types.js';
import { parseAddress } from '../utils/Address.js';
import { parseSafeNumber, parseUint } from '../utils/bigint.js';
import { errorMessage } from '../utils/logger.js';
import {
  EXTENDED_RECORD_FIELDS,
  LEGACY_RECORD_FIELDS,
  extractDataLine,
} from './wireFormat.js';

export class TransactionParseError extends Error {
  constructor(message: string, public readonly recordIndex?: number) {
    super(message);
    this.name = 'TransactionParseError';
  }
}

type RecordLayout = 'extended' | 'legacy';

function detectLayout(fieldCount: number, count: number): RecordLayout {
  const extended = 1 + EXTENDED_RECORD_FIELDS * count;
  const legacy = 1 + LEGACY_RECORD_FIELDS * count;

  if (fieldCount === extended) return 'extended';
  if (fieldCount >= legacy) return 'legacy';

  throw new TransactionParseError(
    `Insufficient fields for ${count} transaction(s): expected at least ${legacy}, got ${fieldCount}`
  );
}

/**
 * Parse `count|record|record|...` into transaction records
 *
 * @throws TransactionParseError on a bad count, short payload or invalid field
 */
export function parseMultipleTransactions(payload: string): TransactionRecord[] {
  const fields = payload.trim().split('|');
  const countField = fields[0] ?? '';

  if (!/^[0-9]+$/.test(countField)) {
    throw new TransactionParseError(`Invalid transaction count: "${countField}"`);
  }
  const count = Number(countField);
  if (count === 0) {
    return [];
  }

  const layout = detectLayout(fields.length, count);
  const width = layout === 'extended' ? EXTENDED_RECORD_FIELDS : LEGACY_RECORD_FIELDS;

  const records: TransactionRecord[] = [];
  for (let i = 0; i < count; i++) {
    const offset = 1 + i * width;
    records.push(parseRecord(fields.slice(offset, offset + width), layout, i));
  }
  return records;
}

function parseRecord(fields: string[], layout: RecordLayout, index: number): TransactionRecord {
  const field = (position: number): string => fields[position] ?? '';

  try {
    const data = field(4).trim();
    return {
      hash: field(0).trim(),
      from: parseAddress(field(1)),
      to: parseAddress(field(2)),
      value: parseUint(field(3)),
      data: data === '' ? '0x' : data,
      blockNumber: parseSafeNumber(field(5)),
      transactionIndex: parseSafeNumber(field(6)),
      gasPrice: parseUint(field(7)),
      gasLimit: layout === 'extended' ? parseUint(field(8)) : 0n,
      maxFeePerGas: layout === 'extended' ? parseUint(field(9)) : 0n,
      maxPriorityFeePerGas: layout === 'extended' ? parseUint(field(10)) : 0n,
    };
  } catch (error) {
    throw new TransactionParseError(`Transaction ${index}: ${errorMessage(error)}`, index);
  }
}

const jsonWireRecordSchema = z.object({
  hash: z.string(),
  from: z.string(),
  to: z.string(),
  value: z.string(),
  data: z.string(),
  block_number: z.string(),
  transaction_index: z.string(),
  gas_price: z.string(),
  gas_limit: z.string().optional(),
  max_fee_per_gas: z.string().optional(),
  max_priority_fee_per_gas: z.string().optional(),
});

/**
 * Parse the `json` payload variant (array of snake_case records)
 */
export function parseJsonTransactions(payload: string): TransactionRecord[] {
  let body: unknown;
  try {
    body = JSON.parse(payload);
  } catch (error) {
    throw new TransactionParseError(`Invalid JSON payload: ${errorMessage(error)}`);
  }

  const parsed = z.array(jsonWireRecordSchema).safeParse(body);
  if (!parsed.success) {
    throw new TransactionParseError(`Invalid JSON payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  return parsed.data.map((record, index) =>
    parseRecord(
      [
        record.hash,
        record.from,
        record.to,
        record.value,
        record.data,
        record.block_number,
        record.transaction_index,
        record.gas_price,
        record.gas_limit ?? '',
        record.max_fee_per_gas ?? '',
        record.max_priority_fee_per_gas ?? '',
      ],
      'extended',
      index
    )
  );
}

/**
 * Parse complete fetcher output (sentinels included) in either payload format
 */
export function parseFetcherOutput(output: string): TransactionRecord[] {
  const payload = extractDataLine(output);
  if (payload === '') {
    throw new TransactionParseError('No TRANSACTION_DATA section found in fetcher output');
  }
  return payload.startsWith('[') ? parseJsonTransactions(payload) : parseMultipleTransactions(payload);
}
