import { watch, type FSWatcher } from 'chokidar';
import { EventEmitter } from 'events';
import { WATCHER } from '../../constants/index.js';
import { compileFilterBandFiles, type CompileOptions } from '../compiler.js';
import type { BuildResult } from '../filterbands/model-builder.js';
import type { FilterBandModel } from '../filterbands/filter-band-model.js';

export interface SourceWatcherOptions extends CompileOptions {
  stabilityThresholdMs?: number;
}

/**
 * Recompiles the filter table whenever either firmware file changes.
 * Each compile starts from scratch; a failed compile leaves the last good
 * model in place.
 *
 * Emits 'compiled' with the BuildResult and 'failed' with the Error.
 */
export class SourceWatcher extends EventEmitter {
  private watcher: FSWatcher | null = null;
  private current: BuildResult | null = null;

  constructor(
    private headerPath: string,
    private sourcePath: string,
    private options: SourceWatcherOptions = {}
  ) {
    super();
  }

  isWatching(): boolean {
    return this.watcher !== null;
  }

  getModel(): FilterBandModel | null {
    return this.current?.model ?? null;
  }

  async compile(): Promise<BuildResult | null> {
    try {
      const result = await compileFilterBandFiles(this.headerPath, this.sourcePath, this.options);
      this.current = result;
      this.emit('compiled', result);
      return result;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      console.error(`Filter band compile failed: ${error.message}`);
      this.emit('failed', error);
      return null;
    }
  }

  start(): void {
    if (this.watcher) return;

    console.log(`Watching firmware sources: ${this.headerPath}, ${this.sourcePath}`);

    this.watcher = watch([this.headerPath, this.sourcePath], {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: this.options.stabilityThresholdMs ?? WATCHER.STABILITY_THRESHOLD_MS,
        pollInterval: WATCHER.POLL_INTERVAL_MS,
      },
    });

    this.watcher.on('change', async (path: string) => {
      console.log(`Firmware source changed: ${path}`);
      await this.compile();
    });

    this.watcher.on('error', (err) => {
      const error = err instanceof Error ? err : new Error(String(err));
      console.error('Source watcher error:', error);
      this.emit('failed', error);
    });
  }

  async stop(): Promise<void> {
    if (this.watcher) {
      const watcher = this.watcher;
      this.watcher = null;
      await watcher.close();
      console.log('Source watcher stopped');
    }
  }
}
