import chokidar from 'chokidar';
import type { FSWatcher } from 'chokidar';
import pino from 'pino';
import { basename } from 'path';
import { safeErrorMessage } from '@objledger/core';
import { isCandidateName } from './scanner.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info', name: 'ingest.watcher' });

export interface DocumentWatcherOptions {
  debounceMs?: number;
  /** Poll the directory instead of relying on native file events. */
  usePolling?: boolean;
  pollIntervalMs?: number;
}

/**
 * Debounced watch of the input directory.
 *
 * Events collect for `debounceMs`, then the batch is handed to `handle` one path
 * at a time, in name order. Batches never overlap, so documents from this
 * process are processed strictly one after another. A rejected `handle` goes to
 * `onError` and the queue keeps going until the watcher is disposed.
 */
export class DocumentWatcher {
  private readonly pending = new Set<string>();
  private readonly debounceMs: number;
  private timer: NodeJS.Timeout | null = null;
  private queue: Promise<void> = Promise.resolve();
  private watcher: FSWatcher | null = null;
  private closed = false;

  constructor(
    private readonly inputDir: string,
    private readonly handle: (path: string) => Promise<unknown>,
    private readonly onError: (error: unknown) => void,
    private readonly options: DocumentWatcherOptions = {}
  ) {
    this.debounceMs = options.debounceMs ?? 500;
  }

  /**
   * Start watching; resolves once the initial directory read is done
   */
  async start(): Promise<void> {
    const watcher = chokidar.watch(this.inputDir, {
      ignoreInitial: true,
      depth: 0,
      usePolling: this.options.usePolling ?? false,
      interval: this.options.pollIntervalMs ?? 5000,
    });
    this.watcher = watcher;

    watcher.on('add', (path: string) => this.enqueue(path));
    watcher.on('change', (path: string) => this.enqueue(path));
    watcher.on('error', (error: Error) => {
      logger.error({ event: 'ingest.watch.error', error: safeErrorMessage(error) }, 'Watcher error');
    });

    await new Promise<void>((resolve) => watcher.once('ready', () => resolve()));
    logger.info(
      { event: 'ingest.watch.started', inputDir: this.inputDir, polling: this.options.usePolling ?? false },
      `Watching ${this.inputDir}`
    );
  }

  enqueue(path: string): void {
    if (this.closed || !isCandidateName(basename(path))) return;
    this.pending.add(path);
    this.schedule();
  }

  /**
   * Hand pending paths over now and wait until everything queued has run
   */
  async drain(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.flush();
    await this.queue;
  }

  /**
   * Stop watching and drop queued paths; resolves once the document in
   * progress has finished
   */
  async dispose(): Promise<void> {
    this.closed = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.pending.clear();
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
    await this.queue;
    logger.info({ event: 'ingest.watch.stopped', inputDir: this.inputDir }, 'Watcher stopped');
  }

  private schedule(): void {
    if (this.timer) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flush();
    }, this.debounceMs);
  }

  private flush(): void {
    if (this.pending.size === 0) return;
    const paths = [...this.pending].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    this.pending.clear();
    this.queue = this.queue.then(() => this.run(paths));
  }

  private async run(paths: string[]): Promise<void> {
    for (const path of paths) {
      if (this.closed) return;
      try {
        await this.handle(path);
      } catch (error) {
        this.onError(error);
      }
    }
  }
}
