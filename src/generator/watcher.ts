import { watch, type FSWatcher } from 'chokidar';
import { EventEmitter } from 'events';
import { resolve } from 'path';
import type { GeneratorOptions } from '../core/options.js';
import {
  generateFromHeaders,
  type GenerateInputs,
  type GenerationResult,
} from './codegen.js';

export interface WatcherOptions {
  inputs: GenerateInputs;
  generatorOptions?: Partial<GeneratorOptions>;
  debounceMs?: number;
  generate?: (
    inputs: GenerateInputs,
    options: Partial<GeneratorOptions>
  ) => Promise<GenerationResult>;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Watches the generator inputs and regenerates every output when one of
 * them changes
 */
export class GenerationWatcher extends EventEmitter {
  private watcher: FSWatcher | null = null;
  private debounceTimer: NodeJS.Timeout | null = null;
  private options: Required<WatcherOptions>;

  constructor(options: WatcherOptions) {
    super();
    this.options = {
      debounceMs: 1000,
      generatorOptions: {},
      generate: generateFromHeaders,
      ...options,
    };
  }

  /** Files whose changes trigger a regeneration */
  watchedPaths(): string[] {
    const { inputs } = this.options;
    return [
      inputs.parserModule,
      inputs.headersFile,
      inputs.coreBindingsFile,
      inputs.allowListFile,
    ].map((filePath) => resolve(filePath));
  }

  /**
   * Start watching the inputs
   */
  start(): void {
    this.watcher = watch(this.watchedPaths(), {
      persistent: true,
      ignoreInitial: false, // Generate on startup
    });

    this.watcher.on('change', (filePath: string) => {
      this.emit('change', filePath);
      this.debouncedGenerate();
    });

    this.watcher.on('add', (filePath: string) => {
      this.emit('change', filePath);
      this.debouncedGenerate();
    });

    this.watcher.on('error', (error: unknown) => {
      this.emit('error', toError(error));
    });
  }

  /**
   * Stop watching
   */
  async stop(): Promise<void> {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }

    if (this.watcher) {
      const watcher = this.watcher;
      this.watcher = null;
      await watcher.close();
    }
  }

  /**
   * Regenerate once the inputs have been quiet for the debounce period
   */
  private debouncedGenerate(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }

    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      void this.generate();
    }, this.options.debounceMs);
  }

  /**
   * Regenerate everything immediately
   */
  async generate(): Promise<void> {
    try {
      const result = await this.options.generate(
        this.options.inputs,
        this.options.generatorOptions
      );
      this.emit('generated', result);
    } catch (error) {
      this.emit('error', toError(error));
    }
  }
}

/**
 * Convenience function to create and start a watcher
 */
export function createWatcher(options: WatcherOptions): GenerationWatcher {
  const watcher = new GenerationWatcher(options);
  watcher.start();
  return watcher;
}
