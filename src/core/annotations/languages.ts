/**
 * Extension → comment syntax table.
 */
import { extname } from '../../utils/file-system.js';
import type { LanguageOverride } from '../config/schema.js';
import type { CommentStyle } from './types.js';

const C_BLOCK = [['/*', '*/']] as const;

interface LanguageEntry {
  style: CommentStyle;
  extensions: readonly string[];
}

const LANGUAGES: readonly LanguageEntry[] = [
  {
    style: { id: 'javascript', family: 'brace', line: ['//'], block: C_BLOCK, quotes: ['"', "'", '`'] },
    extensions: ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'],
  },
  {
    style: { id: 'rust', family: 'brace', line: ['//'], block: C_BLOCK, quotes: ['"'], charLiterals: true },
    extensions: ['.rs'],
  },
  {
    style: { id: 'go', family: 'brace', line: ['//'], block: C_BLOCK, quotes: ['"', "'", '`'] },
    extensions: ['.go'],
  },
  {
    style: { id: 'c-family', family: 'brace', line: ['//'], block: C_BLOCK, quotes: ['"', "'"] },
    extensions: [
      '.c', '.h', '.cc', '.cpp', '.cxx', '.hpp', '.hh', '.java', '.kt', '.kts', '.scala',
      '.swift', '.cs', '.dart', '.zig', '.proto', '.groovy', '.m',
    ],
  },
  {
    style: { id: 'php', family: 'brace', line: ['//', '#'], block: C_BLOCK, quotes: ['"', "'"] },
    extensions: ['.php'],
  },
  {
    style: { id: 'shell', family: 'brace', line: ['#'], block: [], quotes: ['"', "'"] },
    extensions: ['.sh', '.bash', '.zsh', '.pl', '.pm'],
  },
  {
    style: {
      id: 'python',
      family: 'indent',
      line: ['#'],
      block: [['"""', '"""'], ["'''", "'''"]],
      quotes: ['"', "'"],
    },
    extensions: ['.py', '.pyi'],
  },
  {
    style: { id: 'hash-line', family: 'line', line: ['#'], block: [], quotes: ['"', "'"] },
    extensions: ['.rb', '.yaml', '.yml', '.toml', '.r', '.ex', '.exs', '.tf', '.cmake'],
  },
  {
    style: { id: 'dash-line', family: 'line', line: ['--'], block: [['/*', '*/']], quotes: ["'"] },
    extensions: ['.sql'],
  },
  {
    style: { id: 'lua', family: 'line', line: ['--'], block: [['--[[', ']]']], quotes: ['"', "'"] },
    extensions: ['.lua'],
  },
  {
    style: { id: 'haskell', family: 'line', line: ['--'], block: [['{-', '-}']], quotes: ['"'] },
    extensions: ['.hs', '.elm'],
  },
  {
    style: { id: 'lisp', family: 'line', line: [';'], block: [], quotes: ['"'] },
    extensions: ['.clj', '.cljs', '.el', '.lisp', '.scm'],
  },
  {
    style: { id: 'markup', family: 'line', line: [], block: [['<!--', '-->']], quotes: [] },
    extensions: ['.html', '.xml', '.svg', '.vue', '.svelte'],
  },
];

/** Style used for extensions nobody declared. */
export const GENERIC_STYLE: CommentStyle = {
  id: 'generic',
  family: 'brace',
  line: ['//', '#'],
  block: C_BLOCK,
  quotes: ['"', "'"],
};

const BY_EXTENSION: ReadonlyMap<string, CommentStyle> = new Map(
  LANGUAGES.flatMap((entry) => entry.extensions.map((ext) => [ext, entry.style] as const))
);

/**
 * Resolves a file's comment style from the built-in table, with config
 * overrides taking precedence.
 */
export class LanguageTable {
  private overrides: Map<string, CommentStyle>;

  constructor(overrides: Record<string, LanguageOverride> = {}) {
    this.overrides = new Map(
      Object.entries(overrides).map(([ext, override]) => [
        ext.toLowerCase(),
        {
          id: `custom${ext.toLowerCase()}`,
          family: override.family,
          line: override.line,
          block: override.block,
          quotes: override.quotes,
        },
      ])
    );
  }

  styleFor(filePath: string): CommentStyle {
    const ext = extname(filePath);
    return this.overrides.get(ext) ?? BY_EXTENSION.get(ext) ?? GENERIC_STYLE;
  }

  /**
   * Key that changes whenever the style for a file would change; scan
   * cache entries are only reused under the same key.
   */
  styleKey(filePath: string): string {
    return JSON.stringify(this.styleFor(filePath));
  }
}
