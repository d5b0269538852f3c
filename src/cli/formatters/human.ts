/**
 * Human-readable output formatter.
 */
import chalk from 'chalk';
import type { CoverageNode } from '../../core/index/tree.js';
import type {
  ConfigSummary,
  RuleDetail,
  RuleGap,
  SearchResult,
  StatusResult,
  UnmappedUnit,
} from '../../core/query/types.js';
import type { StaleReference } from '../../core/staleness/tracker.js';
import type { Finding } from '../../core/validation/types.js';
import type { FormatOptions } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'blue' | 'cyan' | 'dim' | 'bold';

const MAX_TEXT = 80;

export class HumanFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatStatus(status: StatusResult): string {
    const lines: string[] = [];
    lines.push(this.colorize(`Coverage (version ${status.version})`, 'bold'));

    if (status.pairs.length === 0) {
      lines.push(`   ${this.colorize('(no spec/impl pairings)', 'dim')}`);
    }
    for (const pair of status.pairs) {
      lines.push('');
      lines.push(`${this.colorize(`${pair.spec}/${pair.impl}`, 'cyan')}  ${pair.totalRules} rules`);
      lines.push(`   impl:   ${this.percent(pair.implPercent)}  (${pair.implCovered}/${pair.totalRules})`);
      lines.push(`   verify: ${this.percent(pair.verifyPercent)}  (${pair.verifyCovered}/${pair.totalRules})`);
      if (pair.staleCount > 0) lines.push(`   ${this.colorize(`stale:  ${pair.staleCount}`, 'yellow')}`);
      if (pair.brokenCount > 0) lines.push(`   ${this.colorize(`broken: ${pair.brokenCount}`, 'red')}`);
    }

    lines.push('');
    lines.push(this.summaryLine(status.errors, status.warnings));
    return lines.join('\n');
  }

  formatGaps(gaps: RuleGap[], label: 'uncovered' | 'untested'): string {
    if (gaps.length === 0) {
      return this.colorize(`✓ No ${label} rules`, 'green');
    }

    const lines: string[] = [];
    let current = '';
    for (const gap of gaps) {
      const pair = `${gap.spec}/${gap.impl}`;
      if (pair !== current) {
        if (current) lines.push('');
        lines.push(this.colorize(pair, 'cyan'));
        current = pair;
      }
      const level = gap.level ? this.colorize(gap.level.toUpperCase().padEnd(6), this.levelColor(gap.level)) : '      ';
      lines.push(`   ${level} ${gap.ruleId}  ${this.colorize(`${gap.sourceFile}:${gap.line}`, 'dim')}`);
      if (this.options.verbose && gap.text) {
        lines.push(`          ${this.truncate(gap.text)}`);
      }
    }
    lines.push('');
    lines.push(`${gaps.length} ${label} rule(s)`);
    return lines.join('\n');
  }

  formatStale(stale: StaleReference[]): string {
    if (stale.length === 0) {
      return this.colorize('✓ No stale references', 'green');
    }
    const lines = stale.map(
      (ref) =>
        `${this.colorize(`${ref.file}:${ref.line}`, 'yellow')}  ${ref.verb} ${ref.ruleId}  ` +
        `${this.colorize(`${ref.capturedFingerprint} → ${ref.currentFingerprint}`, 'dim')}`
    );
    lines.push('');
    lines.push(`${stale.length} stale reference(s)`);
    return lines.join('\n');
  }

  formatUnmapped(units: UnmappedUnit[]): string {
    if (units.length === 0) {
      return this.colorize('✓ Every unit is mapped to a rule', 'green');
    }
    const lines = units.map((unit) => {
      const name = unit.name ?? this.colorize('(anonymous)', 'dim');
      return `${unit.file}:${unit.startLine}-${unit.endLine}  ${this.colorize(unit.kind, 'dim')} ${name}`;
    });
    lines.push('');
    lines.push(`${units.length} unmapped unit(s)`);
    return lines.join('\n');
  }

  formatRule(rule: RuleDetail): string {
    const lines: string[] = [];
    lines.push(`${this.colorize(rule.id, 'bold')}  ${this.colorize(`(${rule.spec})`, 'dim')}`);
    lines.push(`   Level:       ${rule.level ?? '(none)'}${rule.explicitLevel ? ' (explicit)' : ''}`);
    lines.push(`   Fingerprint: ${rule.fingerprint}`);
    lines.push(`   Declared:    ${rule.declarations.map((d) => `${d.sourceFile}:${d.line}`).join(', ')}`);
    if (rule.text) {
      lines.push('');
      for (const line of rule.text.split('\n')) {
        lines.push(`   ${line}`);
      }
    }

    lines.push('');
    if (rule.references.length === 0) {
      lines.push(`   ${this.colorize('No references', 'dim')}`);
    }
    for (const ref of rule.references) {
      const marker = ref.stale ? this.colorize(' (stale)', 'yellow') : '';
      lines.push(`   ${ref.verb.padEnd(8)} ${ref.file}:${ref.line}  ${this.colorize(ref.impls.join(', '), 'dim')}${marker}`);
    }
    return lines.join('\n');
  }

  formatFindings(findings: Finding[]): string {
    if (findings.length === 0) {
      return this.colorize('✓ No findings', 'green');
    }

    const lines = findings.map((finding) => {
      const color: Color = finding.severity === 'error' ? 'red' : 'yellow';
      const where = finding.file === null ? '(config)' : `${finding.file}:${finding.line ?? 0}`;
      return `${this.colorize(finding.kind, color)}  ${where}  ${finding.message}`;
    });

    const errors = findings.filter((f) => f.severity === 'error').length;
    lines.push('');
    lines.push(this.summaryLine(errors, findings.length - errors));
    return lines.join('\n');
  }

  formatSearch(results: SearchResult[]): string {
    if (results.length === 0) {
      return this.colorize('No matches', 'dim');
    }
    return results
      .map((result) => {
        const where = this.colorize(`${result.file}:${result.line}`, 'dim');
        const label = result.kind === 'rule' ? this.colorize(result.id, 'cyan') : result.id;
        return `${String(result.score).padStart(3)}  ${label}  ${where}\n     ${this.truncate(result.content)}`;
      })
      .join('\n');
  }

  formatTree(node: CoverageNode, depth = 0): string {
    const indent = '  '.repeat(depth);
    const name = node.path === '' ? '.' : node.type === 'directory' ? `${node.name}/` : node.name;
    const line = `${indent}${name}  ${this.percent(node.percent)}  (${node.coveredUnits}/${node.totalUnits})`;
    const children = node.children.map((child) => this.formatTree(child, depth + 1));
    return [line, ...children].join('\n');
  }

  formatConfig(config: ConfigSummary): string {
    const lines: string[] = [];
    for (const spec of config.specs) {
      lines.push(`${this.colorize(spec.name, 'bold')}  prefix ${spec.prefix}  ${spec.rules} rules`);
      if (spec.sourceUrl) lines.push(`   ${this.colorize(spec.sourceUrl, 'dim')}`);
      for (const impl of spec.impls) {
        lines.push(`   ${impl.name}: ${impl.files} file(s), ${impl.testFiles} test file(s)`);
      }
    }
    return lines.join('\n');
  }

  private summaryLine(errors: number, warnings: number): string {
    if (errors === 0 && warnings === 0) return this.colorize('✓ No findings', 'green');
    const parts = [
      this.colorize(`${errors} error(s)`, errors > 0 ? 'red' : 'dim'),
      this.colorize(`${warnings} warning(s)`, warnings > 0 ? 'yellow' : 'dim'),
    ];
    return parts.join(', ');
  }

  private percent(value: number): string {
    const text = `${value.toFixed(1)}%`.padStart(6);
    return this.colorize(text, value >= 80 ? 'green' : value >= 50 ? 'yellow' : 'red');
  }

  private levelColor(level: string): Color {
    return level === 'must' ? 'red' : level === 'should' ? 'yellow' : 'blue';
  }

  private truncate(text: string): string {
    const oneLine = text.replace(/\s+/g, ' ').trim();
    return oneLine.length > MAX_TEXT ? `${oneLine.slice(0, MAX_TEXT - 1)}…` : oneLine;
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) return text;
    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'blue':
        return chalk.blue(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}
