#!/usr/bin/env node
import { loadConfig } from './env.js';
import { startChat } from './features/chat/index.js';
import { createConsoleLogger } from './util/logger.js';

// Capture unhandled errors for clearer diagnostics
process.on('unhandledRejection', (reason) => {
  console.error('UnhandledRejection:', reason);
});

async function main() {
  const cfg = loadConfig();
  const logger = createConsoleLogger(cfg.logLevel);

  const res = await startChat(cfg, { logger });
  if (!res.ok) {
    console.error(res.error.message);
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error('Fatal error starting chat:', err);
  process.exitCode = 1;
});
