/**
 * Report Generator
 *
 * Renders analyzer results in multiple formats:
 * Console (colored), JSON, Markdown.
 * Every line is built from the structured report; nothing is parsed back.
 */

import chalk from 'chalk';
import type { BreakingChangeReport } from '../analyzers/breaking-changes';
import type { DependencyReport } from '../analyzers/dependencies';
import type { DriftReport } from '../analyzers/drift';
import type { IngestReport } from '../analyzers/ingest';
import { ChangeRecord, ReportFormat, Severity } from './types';

export type AnalysisReport = BreakingChangeReport | DriftReport | DependencyReport | IngestReport;

// ─── Severity Icons & Colors ────────────────────────────────────────────────

const SEVERITY_ICON: Record<Severity, string> = {
  breaking: '🔴',
  minor: '🟡',
  patch: '🔵',
  info: '🟢',
};

const SEVERITY_LABEL: Record<Severity, string> = {
  breaking: 'BREAKING',
  minor: 'MINOR',
  patch: 'PATCH',
  info: 'INFO',
};

const SEVERITY_HEADING: Record<Severity, string> = {
  breaking: 'Breaking Changes',
  minor: 'Minor Changes',
  patch: 'Patch Changes',
  info: 'Informational',
};

const SEVERITIES: Severity[] = ['breaking', 'minor', 'patch', 'info'];

function colorFor(severity: Severity): (text: string) => string {
  switch (severity) {
    case 'breaking':
      return chalk.red;
    case 'minor':
      return chalk.yellow;
    case 'patch':
      return chalk.blue;
    default:
      return chalk.green;
  }
}

// ─── Format Report ──────────────────────────────────────────────────────────

/**
 * Format an analyzer report in the specified format.
 */
export function formatReport(report: AnalysisReport, format: ReportFormat): string {
  switch (format) {
    case 'json':
      return formatJson(report);
    case 'markdown':
      return formatMarkdown(report);
    default:
      return formatConsole(report);
  }
}

// ─── JSON Format ────────────────────────────────────────────────────────────

function formatJson(report: AnalysisReport): string {
  return JSON.stringify(report, null, 2);
}

// ─── Console Format ─────────────────────────────────────────────────────────

function consoleChange(change: ChangeRecord): string {
  const icon = SEVERITY_ICON[change.severity];
  const label = colorFor(change.severity)(SEVERITY_LABEL[change.severity].padEnd(8));
  const where = change.path ? `${change.endpoint} ${chalk.gray(change.path)}` : change.endpoint;
  return `${icon} ${label} ${where}: ${change.description}`;
}

function formatConsole(report: AnalysisReport): string {
  const lines: string[] = [];
  const bar = '━'.repeat(50);

  lines.push('');
  switch (report.type) {
    case 'breaking_changes':
      lines.push(chalk.bold(`🔍 Breaking Change Report: ${report.old} → ${report.new}`));
      lines.push(chalk.gray(bar));
      if (report.changes.length === 0) {
        lines.push(chalk.green('  ✅ No changes detected'));
      }
      for (const change of report.changes) lines.push(consoleChange(change));
      lines.push(chalk.gray(bar));
      lines.push(
        `Summary: ${chalk.red(`${report.counts.breaking} breaking`)} | ${chalk.yellow(`${report.counts.minor} minor`)} | ` +
          `${chalk.blue(`${report.counts.patch} patch`)} | ${chalk.green(`${report.counts.info} info`)}`
      );
      break;

    case 'drift':
      lines.push(chalk.bold(`🔍 Drift Report: ${report.snapshot}`));
      lines.push(chalk.gray(bar));
      for (const s of report.shadow) {
        lines.push(`👻 ${chalk.magenta('SHADOW  ')} ${s.endpoint} (${s.observations} call(s), status ${s.statuses.join(', ')})`);
      }
      for (const m of report.missing) {
        lines.push(`❌ ${chalk.red('MISSING ')} ${m.endpoint} (${m.reason.replace('_', ' ')})`);
      }
      for (const u of report.unresolved) {
        lines.push(`❔ ${chalk.gray('UNRESOLVED')} ${u.endpoint} (${u.reason.replace('_', ' ')})`);
      }
      for (const change of report.schemaDrift) lines.push(consoleChange(change));
      if (report.shadow.length + report.missing.length + report.unresolved.length + report.schemaDrift.length === 0) {
        lines.push(chalk.green('  ✅ No drift detected'));
      }
      lines.push(chalk.gray(bar));
      break;

    case 'dependencies':
      lines.push(chalk.bold(`🔗 Dependency Map: ${report.snapshot}`));
      lines.push(chalk.gray(bar));
      for (const edge of report.edges) {
        lines.push(`  • ${edge.from} → ${edge.to} (via ${edge.resource}, ${edge.rule}, ${edge.confidence})`);
      }
      if (report.edges.length === 0) lines.push('  No dependency edges inferred');
      lines.push(chalk.gray(bar));
      break;

    case 'ingest':
      lines.push(chalk.bold(report.action === 'index' ? '📥 Specification Indexed' : '📋 Snapshot Status'));
      lines.push(chalk.gray(bar));
      if (report.action === 'index') {
        for (const warning of report.warnings) lines.push(chalk.yellow(`⚠️  ${warning}`));
      }
      break;
  }

  lines.push(report.summary);
  lines.push('');
  return lines.join('\n');
}

// ─── Markdown Format ────────────────────────────────────────────────────────

function markdownChange(change: ChangeRecord): string[] {
  const lines = [`- \`${change.endpoint}\`${change.path ? ` **${change.path}**` : ''}: ${change.description}`];
  if (change.before !== undefined || change.after !== undefined) {
    lines.push(`  - Before: \`${change.before ?? 'N/A'}\` → After: \`${change.after ?? 'N/A'}\``);
  }
  return lines;
}

function markdownChanges(changes: ChangeRecord[]): string[] {
  const lines: string[] = [];
  for (const severity of SEVERITIES) {
    const group = changes.filter((c) => c.severity === severity);
    if (group.length === 0) continue;
    lines.push(`## ${SEVERITY_ICON[severity]} ${SEVERITY_HEADING[severity]}`);
    lines.push('');
    for (const change of group) lines.push(...markdownChange(change));
    lines.push('');
  }
  return lines;
}

function formatMarkdown(report: AnalysisReport): string {
  const lines: string[] = [];

  switch (report.type) {
    case 'breaking_changes':
      lines.push(`# 🔍 Breaking Change Report: ${report.old} → ${report.new}`);
      lines.push('');
      lines.push(`**Summary:** ${report.summary}`);
      lines.push('');
      lines.push('| Breaking | Minor | Patch | Info |');
      lines.push('|---|---|---|---|');
      lines.push(`| ${report.counts.breaking} | ${report.counts.minor} | ${report.counts.patch} | ${report.counts.info} |`);
      lines.push('');
      lines.push(...markdownChanges(report.changes));
      break;

    case 'drift':
      lines.push(`# 🔍 Drift Report: ${report.snapshot}`);
      lines.push('');
      lines.push(`**Summary:** ${report.summary}`);
      lines.push('');
      if (report.shadow.length > 0) {
        lines.push('## 👻 Shadow Endpoints');
        lines.push('');
        for (const s of report.shadow) lines.push(`- \`${s.endpoint}\` (status ${s.statuses.join(', ')})`);
        lines.push('');
      }
      if (report.missing.length > 0) {
        lines.push('## ❌ Missing Endpoints');
        lines.push('');
        for (const m of report.missing) lines.push(`- \`${m.endpoint}\` (${m.reason})`);
        lines.push('');
      }
      if (report.unresolved.length > 0) {
        lines.push('## ❔ Unresolved (insufficient evidence)');
        lines.push('');
        for (const u of report.unresolved) lines.push(`- \`${u.endpoint}\` (${u.reason})`);
        lines.push('');
      }
      lines.push(...markdownChanges(report.schemaDrift));
      break;

    case 'dependencies':
      lines.push(`# 🔗 Dependency Map: ${report.snapshot}`);
      lines.push('');
      lines.push(`**Summary:** ${report.summary}`);
      lines.push('');
      if (report.edges.length > 0) {
        lines.push('| From | To | Resource | Rule | Confidence |');
        lines.push('|---|---|---|---|---|');
        for (const edge of report.edges) {
          lines.push(`| \`${edge.from}\` | \`${edge.to}\` | ${edge.resource} | ${edge.rule ?? ''} | ${edge.confidence ?? ''} |`);
        }
        lines.push('');
      }
      break;

    case 'ingest':
      lines.push(report.action === 'index' ? '# 📥 Specification Indexed' : '# 📋 Snapshot Status');
      lines.push('');
      lines.push(report.summary);
      if (report.action === 'index' && report.warnings.length > 0) {
        lines.push('');
        for (const warning of report.warnings) lines.push(`- ⚠️ ${warning}`);
      }
      lines.push('');
      break;
  }

  return lines.join('\n').trimEnd() + '\n';
}
