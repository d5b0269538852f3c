/**
 * IndexController - owns the live snapshot and its version counter.
 *
 * Lifecycle: build on start, swap atomically on reload, keep serving the
 * previous snapshot when a rebuild fails. Reload requests made while a
 * rebuild is running share one queued rerun.
 */
import { ScanCache } from '../annotations/cache.js';
import { loadConfig } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import type { Snapshot } from '../index/types.js';
import type { SnapshotSource } from '../query/service.js';
import { ErrorCodes, RebuildError, TracemarkError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { buildSnapshot } from './rebuild.js';

const log = logger.child('controller');

export interface IndexControllerOptions {
  projectRoot: string;
  /** Config file path, relative to the project root */
  configPath?: string;
  /**
   * Fixed in-memory config. When absent the config file is re-read on
   * every rebuild.
   */
  config?: Config;
}

export type SwapListener = (snapshot: Snapshot) => void;

export class IndexController implements SnapshotSource {
  private snapshot: Snapshot | null = null;
  private version = 0;
  private running: Promise<number> | null = null;
  private queued: Promise<number> | null = null;
  private readonly cache = new ScanCache();
  private readonly listeners = new Set<SwapListener>();

  constructor(private readonly options: IndexControllerOptions) {}

  get projectRoot(): string {
    return this.options.projectRoot;
  }

  get configPath(): string | undefined {
    return this.options.configPath;
  }

  /**
   * Build the first snapshot.
   */
  async start(): Promise<number> {
    return this.reload();
  }

  /**
   * Request a full rebuild. Resolves with the version of the snapshot that
   * includes this request; rejects with RebuildError if that rebuild fails.
   */
  reload(): Promise<number> {
    if (this.queued) return this.queued;
    if (!this.running) return this.launch();

    const settled = this.running.then(
      () => undefined,
      () => undefined
    );
    const queued = settled.then(() => {
      this.queued = null;
      return this.launch();
    });
    this.queued = queued;
    return queued;
  }

  /**
   * The live snapshot.
   */
  current(): Snapshot {
    if (!this.snapshot) {
      throw new TracemarkError(ErrorCodes.NOT_READY, 'Index has not been built yet; call start() first');
    }
    return this.snapshot;
  }

  hasSnapshot(): boolean {
    return this.snapshot !== null;
  }

  getVersion(): number {
    return this.version;
  }

  isRebuilding(): boolean {
    return this.running !== null;
  }

  /**
   * Subscribe to snapshot swaps. Returns an unsubscribe function.
   */
  onSwap(listener: SwapListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(snapshot: Snapshot): void {
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        log.warn(`Swap listener failed: ${errorMessage(error)}`);
      }
    }
  }

  private launch(): Promise<number> {
    const run: Promise<number> = this.rebuild().finally(() => {
      if (this.running === run) this.running = null;
    });
    this.running = run;
    return run;
  }

  private async rebuild(): Promise<number> {
    const started = Date.now();
    try {
      const config = this.options.config ?? (await loadConfig(this.options.projectRoot, this.options.configPath));
      const built = await buildSnapshot(config, { projectRoot: this.options.projectRoot, cache: this.cache });

      const version = this.version + 1;
      const snapshot: Snapshot = { ...built, version };
      this.snapshot = snapshot;
      this.version = version;

      log.info(`Index rebuilt (version ${version}, ${Date.now() - started}ms)`);
      this.notify(snapshot);
      return version;
    } catch (error) {
      log.error(
        this.snapshot
          ? `Rebuild failed; still serving version ${this.version}`
          : 'Rebuild failed; no snapshot is available yet',
        error instanceof Error ? error : undefined
      );
      throw new RebuildError(`Rebuild failed: ${errorMessage(error)}`, {
        version: this.version,
        cause: error instanceof TracemarkError ? error.code : undefined,
      });
    }
  }
}
