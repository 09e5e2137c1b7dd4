// Vitest global environment setup: quiet logs and keep tests off the network.
process.env.NODE_ENV = 'test';

if (!process.env.LOG_LEVEL) process.env.LOG_LEVEL = 'error';

// Tests pass configuration explicitly; never pick up a developer's RPC endpoint
delete process.env.RPC_URL;
