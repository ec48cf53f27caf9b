import { writeFileSync } from 'fs'
import type { RunReport, ScanReport } from '../../types/index.js'
import type { Reporter, JsonReportOptions } from './base.js'

/**
 * JSON Reporter for scan and remediation results
 *
 * The machine-readable counterpart of the status lines printed by the CLI.
 */
export class JsonReporter<T extends ScanReport | RunReport = ScanReport | RunReport>
  implements Reporter<T> {
  private readonly defaultOptions: JsonReportOptions = {
    format: 'json',
    pretty: true
  }

  generate(report: T, options?: Partial<JsonReportOptions>): string {
    const opts = { ...this.defaultOptions, ...options }
    return opts.pretty ? JSON.stringify(report, null, 2) : JSON.stringify(report)
  }

  write(report: T, options?: Partial<JsonReportOptions>): void {
    const opts = { ...this.defaultOptions, ...options }
    const json = this.generate(report, opts)

    if (opts.output) {
      writeFileSync(opts.output, json + '\n', 'utf-8')
    } else if (!opts.quiet) {
      process.stdout.write(json + '\n')
    }
  }
}

/**
 * Create a new JSON reporter instance
 */
export function createJsonReporter(): JsonReporter {
  return new JsonReporter()
}
