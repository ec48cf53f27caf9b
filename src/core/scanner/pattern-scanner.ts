import { join } from 'path'
import type { Finding } from '../../types/index.js'
import { PATTERN_RULES, type PatternRule } from './rules.js'
import { getFiles, matchesPattern, readFileContent, type GetFilesOptions } from './utils.js'

/** Maximum length of matchedText in findings */
const MAX_EVIDENCE_LENGTH = 120

/**
 * Suppress rules (by name or category, or '*') for files matching a glob
 */
export interface ScanException {
  pattern: string
  ignore: readonly string[]
  reason?: string
}

export interface PatternScannerOptions {
  /** Lines containing any of these substrings are never reported */
  allowList?: readonly string[]
  exceptions?: readonly ScanException[]
  rules?: readonly PatternRule[]
}

export interface TreeScanResult {
  /** Files scanned, relative to the root, in lexical order */
  files: string[]
  findings: Finding[]
  errors: string[]
}

/**
 * Line-oriented scanner for unsafe C patterns.
 *
 * Purely textual: it never parses C and has no side effects beyond reading.
 */
export class PatternScanner {
  private readonly allowList: readonly string[]
  private readonly exceptions: readonly ScanException[]
  private readonly rules: readonly PatternRule[]

  constructor(options: PatternScannerOptions = {}) {
    this.allowList = options.allowList ?? []
    this.exceptions = options.exceptions ?? []
    this.rules = options.rules ?? PATTERN_RULES
  }

  /**
   * Findings for one file's text. The sequence is lazy, and each iteration
   * makes a fresh pass over the lines.
   */
  scan(text: string, file: string): Iterable<Finding> {
    return {
      [Symbol.iterator]: () => this.iterate(text, file)
    }
  }

  private *iterate(text: string, file: string): Generator<Finding> {
    const rules = this.rules.filter(
      rule => !this.isSuppressed(file, rule) && (rule.fileCondition?.(text) ?? true)
    )
    if (rules.length === 0 || text.length === 0) {
      return
    }

    const lines = text.split('\n')
    for (let index = 0; index < lines.length; index++) {
      const line = lines[index].replace(/\r$/, '')
      if (this.allowList.some(entry => line.includes(entry))) {
        continue
      }

      // Findings carry no column, so a rule reports a line once however often it matches
      for (const rule of rules) {
        const match = rule.pattern.exec(line)
        if (!match || (rule.lineCondition && !rule.lineCondition(line))) {
          continue
        }
        const evidence = rule.evidence === 'line' ? line.trim() : match[0]
        yield {
          file,
          line: index + 1,
          category: rule.category,
          rule: rule.name,
          severity: rule.severity,
          message: rule.message,
          matchedText: evidence.slice(0, MAX_EVIDENCE_LENGTH)
        }
      }
    }
  }

  /**
   * Scan a file on disk. Invalid UTF-8 is replaced, not fatal.
   * @param file - Path relative to rootDir
   */
  scanFile(rootDir: string, file: string): Finding[] {
    const content = readFileContent(join(rootDir, file))
    if (content === null) {
      throw new Error(`Cannot read ${file}`)
    }
    return [...this.scan(content, file)]
  }

  /**
   * Scan every matching file under rootDir, in lexical path order.
   * An unreadable file is recorded in errors and the walk continues.
   */
  scanTree(rootDir: string, options?: GetFilesOptions): TreeScanResult {
    const files = getFiles(rootDir, options)
    const findings: Finding[] = []
    const errors: string[] = []

    for (const file of files) {
      try {
        findings.push(...this.scanFile(rootDir, file))
      } catch (error) {
        errors.push(error instanceof Error ? error.message : String(error))
      }
    }

    return { files, findings, errors }
  }

  private isSuppressed(file: string, rule: PatternRule): boolean {
    return this.exceptions.some(
      exception =>
        matchesPattern(file, exception.pattern) &&
        (exception.ignore.includes('*') ||
          exception.ignore.includes(rule.name) ||
          exception.ignore.includes(rule.category))
    )
  }
}
