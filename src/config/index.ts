import dotenv from 'dotenv';

import { parseEnv } from './envSchema.js';

dotenv.config();

export const config = {
  get logLevel() { return parseEnv().logLevel; },
  get rpcTimeoutMs() { return parseEnv().rpcTimeoutMs; },
  get rpcMaxRetries() { return parseEnv().rpcMaxRetries; },
  get raw() { return parseEnv().raw; },
};
