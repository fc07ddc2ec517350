import { fileURLToPath } from 'url';
import { dirname, join, isAbsolute } from 'path';
import { FIRMWARE, WATCHER } from '../constants/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const firmwareDir = process.env.FIRMWARE_DIR || join(__dirname, '../../firmware');

function inFirmwareDir(file: string): string {
  return isAbsolute(file) ? file : join(firmwareDir, file);
}

export const config = {
  firmware: {
    dir: firmwareDir,
    headerPath: inFirmwareDir(process.env.FILTER_BANDS_HEADER || 'rxFilterBands.h'),
    sourcePath: inFirmwareDir(process.env.FILTER_BANDS_SOURCE || 'rxFilterBands.c'),
    arrayName: process.env.FILTER_BANDS_ARRAY || FIRMWARE.ARRAY_NAME,
  },

  output: {
    path: process.env.FILTER_BANDS_OUTPUT || join(__dirname, '../../generated/rx-filter-bands.ts'),
    /** Library entry the generated module imports from */
    runtimeEntry: join(__dirname, '../index.ts'),
  },

  server: {
    port: parseInt(process.env.PORT || '3000', 10),
    host: process.env.HOST || '0.0.0.0',
  },

  watch: {
    stabilityThresholdMs: parseInt(process.env.WATCH_DEBOUNCE_MS || String(WATCHER.STABILITY_THRESHOLD_MS), 10),
  },
};
