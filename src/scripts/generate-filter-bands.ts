#!/usr/bin/env node
/**
 * Generate the RX filter-band module from the firmware sources
 *
 * Reads the header and source configured in .env (or the defaults under
 * firmware/), compiles the rxFilterBands table and writes a TypeScript module
 * for downstream control software.
 *
 * Usage:
 *   npx tsx src/scripts/generate-filter-bands.ts [--watch] [--output PATH]
 *
 * Options:
 *   --watch        Regenerate whenever either firmware file changes
 *   --output PATH  Write the module here instead of FILTER_BANDS_OUTPUT
 */

import 'dotenv/config';
import { basename, resolve } from 'path';

import { config } from '../config/index.js';
import { compileFilterBandFiles, type CompileOptions } from '../services/compiler.js';
import { writeModule } from '../services/codegen/module-generator.js';
import { SourceWatcher } from '../services/firmware/source-watcher.js';
import type { BuildResult } from '../services/filterbands/model-builder.js';

interface Options {
  watch: boolean;
  output: string;
}

function parseArgs(): Options {
  const args = process.argv.slice(2);
  const options: Options = {
    watch: false,
    output: config.output.path,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--watch' || arg === '-w') {
      options.watch = true;
    } else if (arg === '--output' && args[i + 1]) {
      options.output = resolve(args[++i]);
    } else if (arg === '--help' || arg === '-h') {
      console.log(`
Generate the RX filter-band module from the firmware sources

Usage:
  npx tsx src/scripts/generate-filter-bands.ts [options]

Options:
  --watch, -w    Regenerate whenever either firmware file changes
  --output PATH  Write the module here (default: ${config.output.path})
  --help         Show this help message

Environment:
  FIRMWARE_DIR, FILTER_BANDS_HEADER, FILTER_BANDS_SOURCE,
  FILTER_BANDS_ARRAY, FILTER_BANDS_OUTPUT, WATCH_DEBOUNCE_MS
`);
      process.exit(0);
    } else {
      console.error(`Unknown option: ${arg} (try --help)`);
      process.exit(1);
    }
  }

  return options;
}

async function emit(result: BuildResult, output: string): Promise<void> {
  for (const warning of result.warnings) {
    console.warn(`Warning: ${warning}`);
  }

  await writeModule(result.model, output, {
    runtimeEntry: config.output.runtimeEntry,
    sources: [basename(config.firmware.headerPath), basename(config.firmware.sourcePath)],
  });
  console.log(`Generated ${output} with ${result.model.size} filter entries`);
}

async function watchSources(options: Options, compileOptions: CompileOptions): Promise<void> {
  const watcher = new SourceWatcher(config.firmware.headerPath, config.firmware.sourcePath, {
    ...compileOptions,
    stabilityThresholdMs: config.watch.stabilityThresholdMs,
  });

  watcher.on('compiled', (result: BuildResult) => {
    emit(result, options.output).catch((err) => {
      console.error('Failed to write module:', err);
    });
  });

  // A failed first compile is reported by the watcher; keep watching for a fix
  await watcher.compile();
  watcher.start();

  const shutdown = async () => {
    console.log('Shutting down...');
    await watcher.stop();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

async function main(): Promise<void> {
  const options = parseArgs();
  const compileOptions: CompileOptions = { arrayName: config.firmware.arrayName };

  console.log('='.repeat(60));
  console.log('RX Filter-Band Generator');
  console.log('='.repeat(60));
  console.log(`Header: ${config.firmware.headerPath}`);
  console.log(`Source: ${config.firmware.sourcePath}`);
  console.log(`Output: ${options.output}`);
  console.log('-'.repeat(60));

  if (options.watch) {
    await watchSources(options, compileOptions);
    return;
  }

  const result = await compileFilterBandFiles(config.firmware.headerPath, config.firmware.sourcePath, compileOptions);
  await emit(result, options.output);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
