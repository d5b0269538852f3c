/**
 * Formatter type definitions.
 */

export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Show rule text under each gap */
  verbose: boolean;
}
