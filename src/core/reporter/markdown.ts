import { writeFileSync } from 'fs'
import type { Finding, FindingCategory, ReportOptions, ScanReport, Severity } from '../../types/index.js'
import type { Reporter } from './base.js'

export type MarkdownReportOptions = ReportOptions

const SEVERITY_ORDER: readonly Severity[] = ['critical', 'high', 'medium', 'low', 'info']

const SEVERITY_EMOJI: Record<Severity, string> = {
  critical: '🔴',
  high: '🟠',
  medium: '🟡',
  low: '🔵',
  info: 'ℹ️'
}

const CATEGORY_LABELS: ReadonlyArray<[FindingCategory, string]> = [
  ['unsafe-call', 'Unsafe calls'],
  ['unchecked-allocation', 'Allocations without release'],
  ['overflow-risk', 'Overflow risks']
]

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1)
}

/**
 * Group findings by severity, most severe first
 */
function groupFindingsBySeverity(findings: readonly Finding[]): Map<Severity, Finding[]> {
  const groups = new Map<Severity, Finding[]>()
  for (const severity of SEVERITY_ORDER) {
    groups.set(severity, [])
  }
  for (const finding of findings) {
    groups.get(finding.severity)?.push(finding)
  }
  return groups
}

function generateStatsSection(report: ScanReport): string {
  const { stats } = report
  return [
    '## Repository',
    '',
    '| Metric | Value |',
    '|--------|-------|',
    `| Root | \`${report.root}\` |`,
    `| Files | ${stats.totalFiles} |`,
    `| C sources | ${stats.sourceFiles} |`,
    `| Headers | ${stats.headerFiles} |`,
    `| Test files | ${stats.testFiles} |`,
    `| Documentation files | ${stats.documentationFiles} |`,
    `| Build files | ${stats.buildFiles} |`,
    `| C source lines | ${stats.totalLines} |`,
    `| Function definitions | ${stats.functions} |`,
    ''
  ].join('\n')
}

function generateSummarySection(report: ScanReport): string {
  const byCategory = new Map<FindingCategory, number>()
  for (const finding of report.findings) {
    byCategory.set(finding.category, (byCategory.get(finding.category) ?? 0) + 1)
  }

  const lines = [
    '## Summary',
    '',
    '| Severity | Count |',
    '|----------|-------|',
    ...SEVERITY_ORDER.map(s => `| ${SEVERITY_EMOJI[s]} ${capitalize(s)} | ${report.summary[s]} |`),
    '',
    '| Category | Count |',
    '|----------|-------|'
  ]
  for (const [category, label] of CATEGORY_LABELS) {
    lines.push(`| ${label} | ${byCategory.get(category) ?? 0} |`)
  }
  lines.push('')
  return lines.join('\n')
}

function generateFindingsSection(findings: readonly Finding[]): string {
  if (findings.length === 0) {
    return '## Findings\n\nNo suspicious patterns found.\n'
  }

  const lines: string[] = ['## Findings', '']
  for (const [severity, group] of groupFindingsBySeverity(findings)) {
    if (group.length === 0) continue

    lines.push(`### ${SEVERITY_EMOJI[severity]} ${capitalize(severity)} (${group.length})`, '')
    lines.push('| Location | Rule | Match |', '|----------|------|-------|')
    for (const finding of group) {
      const match = finding.matchedText.replace(/\|/g, '\\|')
      lines.push(`| \`${finding.file}:${finding.line}\` | ${finding.rule} | \`${match}\` |`)
    }
    lines.push('')
  }
  return lines.join('\n')
}

function generateErrorsSection(errors: readonly string[]): string {
  if (errors.length === 0) {
    return ''
  }
  return ['## Errors', '', ...errors.map(e => `- ${e}`), ''].join('\n')
}

/**
 * Markdown Reporter for scan results
 *
 * A findings and repository statistics document for human readers. The
 * allocation findings are file-scoped heuristics and the report says so.
 */
export class MarkdownReporter implements Reporter<ScanReport> {
  private readonly defaultOptions: MarkdownReportOptions = {
    format: 'markdown'
  }

  generate(report: ScanReport): string {
    const sections: string[] = [
      '# C Source Scan Report',
      '',
      `*Generated: ${report.timestamp}*`,
      ...(report.planName ? [`*Plan: ${report.planName}*`] : []),
      `*Duration: ${(report.duration / 1000).toFixed(2)}s*`,
      '',
      '---',
      '',
      generateStatsSection(report),
      generateSummarySection(report),
      generateFindingsSection(report.findings),
      generateErrorsSection(report.errors),
      '---',
      '',
      '*Allocation findings are file-scoped: a release call anywhere in the file silences them.*'
    ]

    return sections.join('\n')
  }

  write(report: ScanReport, options?: Partial<MarkdownReportOptions>): void {
    const opts = { ...this.defaultOptions, ...options }
    const markdown = this.generate(report)

    if (opts.output) {
      writeFileSync(opts.output, markdown + '\n', 'utf-8')
    } else if (!opts.quiet) {
      process.stdout.write(markdown + '\n')
    }
  }
}

/**
 * Create a new Markdown reporter instance
 */
export function createMarkdownReporter(): MarkdownReporter {
  return new MarkdownReporter()
}
