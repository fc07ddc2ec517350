#!/usr/bin/env node
/**
 * Serve the compiled filter table over HTTP
 *
 * Usage:
 *   npx tsx src/scripts/serve-filter-bands.ts [--watch]
 *
 * Options:
 *   --watch  Recompile and swap in the new table when the firmware files change
 */

import 'dotenv/config';

import { config } from '../config/index.js';
import { createServer } from '../server.js';
import { SourceWatcher } from '../services/firmware/source-watcher.js';
import type { BuildResult } from '../services/filterbands/model-builder.js';

async function main() {
  const args = process.argv.slice(2);
  if (args.includes('--help') || args.includes('-h')) {
    console.log(`
Serve the compiled filter table over HTTP

Usage:
  npx tsx src/scripts/serve-filter-bands.ts [--watch]

Options:
  --watch, -w  Recompile when the firmware files change
  --help       Show this help message
`);
    process.exit(0);
  }
  const watch = args.includes('--watch') || args.includes('-w');

  const watcher = new SourceWatcher(config.firmware.headerPath, config.firmware.sourcePath, {
    arrayName: config.firmware.arrayName,
    stabilityThresholdMs: config.watch.stabilityThresholdMs,
  });

  watcher.on('compiled', (result: BuildResult) => {
    for (const warning of result.warnings) {
      console.warn(`Warning: ${warning}`);
    }
    console.log(`Loaded ${result.model.size} filter entries`);
  });

  const initial = await watcher.compile();
  if (!initial) {
    process.exit(1);
  }
  if (watch) {
    watcher.start();
  }

  const app = await createServer(() => watcher.getModel());

  await app.listen({ port: config.server.port, host: config.server.host });
  console.log(`Server listening on http://${config.server.host}:${config.server.port}`);

  // Graceful shutdown
  const shutdown = async () => {
    console.log('Shutting down...');
    await watcher.stop();
    await app.close();
    console.log('Server closed');
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
