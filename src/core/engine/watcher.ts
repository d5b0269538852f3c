/**
 * IndexWatcher - debounced file-system notifications that trigger reloads.
 *
 * Chokidar v4 has no glob support, so the static base directory of every
 * configured pattern is watched and events are filtered here.
 */
import { existsSync } from 'node:fs';
import * as path from 'node:path';
import chokidar, { type FSWatcher } from 'chokidar';
import { getConfigPath } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import { loadGitIgnore, type GitIgnore } from '../../utils/gitignore.js';
import { relativeTo } from '../../utils/file-system.js';
import { createPathMatcher, globBase, type PathMatcher } from '../../utils/path-matcher.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { IndexController } from './controller.js';

const log = logger.child('watch');

const GITIGNORE = '.gitignore';
const IGNORED_DIRECTORIES = /(^|[\\/])(node_modules|\.git)([\\/]|$)/;

export interface IndexWatcherOptions {
  /** Overrides `watch.debounce_ms` from the config */
  debounceMs?: number;
  /** Poll instead of using native events (network drives, containers) */
  usePolling?: boolean;
}

/**
 * Editor and tool temp files: `foo.ts.tmp.123`, `foo~`, `.foo.swp`, `.#foo`.
 */
export function isTempArtifact(filePath: string): boolean {
  const name = path.basename(filePath);
  return (
    name.includes('.tmp.') ||
    name.endsWith('.tmp') ||
    name.endsWith('~') ||
    /\.sw[a-p]$/.test(name) ||
    name.startsWith('.#')
  );
}

/**
 * Paths of the config that an event must match to trigger a rebuild.
 */
export function createChangeFilter(config: Config): PathMatcher {
  const matchers: PathMatcher[] = config.specs.flatMap((spec) => [
    createPathMatcher(spec.include),
    ...spec.impls.map((impl) => createPathMatcher([...impl.include, ...impl.test_include], impl.exclude)),
  ]);

  return {
    matches: (filePath) => matchers.some((matcher) => matcher.matches(filePath)),
    filter(filePaths) {
      return filePaths.filter((filePath) => this.matches(filePath));
    },
  };
}

/**
 * Directories to hand to chokidar: the base of every pattern, deduplicated
 * and without children of directories already listed.
 */
export function watchRoots(config: Config): string[] {
  const bases = new Set<string>();
  for (const spec of config.specs) {
    spec.include.forEach((pattern) => bases.add(globBase(pattern)));
    for (const impl of spec.impls) {
      [...impl.include, ...impl.test_include].forEach((pattern) => bases.add(globBase(pattern)));
    }
  }

  const sorted = [...bases].sort();
  return sorted.filter(
    (base) => !sorted.some((other) => other !== base && (other === '.' || base.startsWith(`${other}/`)))
  );
}

export class IndexWatcher {
  private watcher: FSWatcher | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  /** Config or .gitignore changes seen, and how many of them the targets reflect */
  private configChanges = 0;
  private appliedConfigChanges = 0;
  private filter: PathMatcher;
  private gitignore: GitIgnore | null = null;
  private readonly configFile: string;

  constructor(
    private readonly controller: IndexController,
    private readonly options: IndexWatcherOptions = {}
  ) {
    this.configFile = relativeTo(
      controller.projectRoot,
      getConfigPath(controller.projectRoot, controller.configPath)
    );
    this.filter = createChangeFilter(controller.current().config);
  }

  async start(): Promise<void> {
    const projectRoot = this.controller.projectRoot;
    this.gitignore = await loadGitIgnore(projectRoot);

    const targets = this.targets();
    this.watcher = chokidar.watch(targets, {
      ignored: (filePath: string) => IGNORED_DIRECTORIES.test(path.relative(projectRoot, filePath)),
      ignoreInitial: true,
      persistent: true,
      usePolling: this.options.usePolling ?? false,
      interval: 500,
    });

    this.watcher
      .on('add', (filePath) => this.handleChange(filePath))
      .on('change', (filePath) => this.handleChange(filePath))
      .on('unlink', (filePath) => this.handleChange(filePath))
      .on('error', (error) => log.warn(`Watcher error: ${errorMessage(error)}`))
      .on('ready', () => log.info(`Watching ${targets.length} path(s) for changes`));
  }

  async close(): Promise<void> {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    await this.watcher?.close();
    this.watcher = null;
  }

  /**
   * Decide whether an event path matters. Exposed for tests.
   */
  isRelevant(relativePath: string): boolean {
    if (relativePath === this.configFile || relativePath === GITIGNORE) return true;
    if (isTempArtifact(relativePath)) return false;
    if (this.gitignore?.ignores(relativePath)) return false;
    return this.filter.matches(relativePath);
  }

  /**
   * Record a file event and schedule a debounced reload.
   */
  handleChange(absolutePath: string): void {
    const relativePath = relativeTo(this.controller.projectRoot, absolutePath);
    if (!this.isRelevant(relativePath)) return;

    if (relativePath === this.configFile || relativePath === GITIGNORE) {
      this.configChanges++;
    }
    log.debug(`Change detected: ${relativePath}`);
    this.schedule();
  }

  private schedule(): void {
    if (this.timer) clearTimeout(this.timer);
    const debounceMs = this.options.debounceMs ?? this.controller.current().config.watch.debounce_ms;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flush().catch((error: unknown) => {
        log.error(`Reload after change failed: ${errorMessage(error)}`);
      });
    }, debounceMs);
  }

  hasPendingReconfigure(): boolean {
    return this.configChanges !== this.appliedConfigChanges;
  }

  /**
   * Reload now. Watch targets are refreshed only after a successful reload,
   * so a config change survives a failed one.
   */
  async flush(): Promise<void> {
    const seen = this.configChanges;

    const version = await this.controller.reload();
    log.debug(`Reloaded to version ${version}`);

    if (seen !== this.appliedConfigChanges) {
      this.appliedConfigChanges = seen;
      this.gitignore = await loadGitIgnore(this.controller.projectRoot);
      this.filter = createChangeFilter(this.controller.current().config);
      this.watcher?.add(this.targets());
      log.info('Config or .gitignore changed; watch targets updated');
    }
  }

  private targets(): string[] {
    const projectRoot = this.controller.projectRoot;
    const roots = watchRoots(this.controller.current().config)
      .map((base) => path.join(projectRoot, base))
      .filter((dir) => existsSync(dir));
    return [...roots, path.join(projectRoot, this.configFile), path.join(projectRoot, GITIGNORE)];
  }
}
