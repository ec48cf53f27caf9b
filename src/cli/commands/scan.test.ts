import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { buildScanReport, executeScan } from './scan.js'
import { STRBUFFER_C } from '../../core/__fixtures__/strbuffer.js'

describe('scan command', () => {
  let dir: string
  let root: string

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true)

    dir = mkdtempSync(join(tmpdir(), 'pw-scan-cmd-'))
    root = join(dir, 'tree')
    mkdirSync(join(root, 'src'), { recursive: true })
    writeFileSync(join(root, 'src', 'strbuffer.c'), STRBUFFER_C)
    writeFileSync(join(root, 'src', 'strbuffer.h'), 'int strbuffer_init(strbuffer_t *strbuff);\n')
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  describe('buildScanReport', () => {
    it('collects findings and statistics', () => {
      const report = buildScanReport(root)

      expect(report.root).toBe(root)
      expect(report.planName).toBeUndefined()
      expect(report.findings.map(f => `${f.file}:${f.line}:${f.rule}`)).toEqual([
        'src/strbuffer.c:33:unsafe_string_copy'
      ])
      expect(report.summary).toEqual({ critical: 0, high: 1, medium: 0, low: 0, info: 0 })
      expect(report.stats).toMatchObject({ sourceFiles: 1, headerFiles: 1, totalLines: 48, functions: 4 })
      expect(report.errors).toEqual([])
    })

    it('applies a plan allow list', () => {
      const report = buildScanReport(root, {
        include: ['**/*.c'],
        exclude: [],
        allow_list: ['strcpy(strbuff->value'],
        exceptions: []
      }, 'allowing')

      expect(report.planName).toBe('allowing')
      expect(report.findings).toEqual([])
    })
  })

  describe('executeScan', () => {
    it('writes a JSON report and returns SUCCESS', () => {
      const output = join(dir, 'report.json')

      const code = executeScan(root, { output, format: 'json' }, {})

      expect(code).toBe(0)
      const report: { findings: Array<{ rule: string }> } = JSON.parse(readFileSync(output, 'utf-8'))
      expect(report.findings.map(f => f.rule)).toEqual(['unsafe_string_copy'])
    })

    it('writes a Markdown report', () => {
      const output = join(dir, 'report.md')

      executeScan(root, { output, format: 'markdown' }, {})

      const md = readFileSync(output, 'utf-8')
      expect(md.startsWith('# C Source Scan Report\n')).toBe(true)
      expect(md).toContain('| `src/strbuffer.c:33` | unsafe_string_copy | `strcpy(` |')
    })

    it('prints the report to stdout without an output file', () => {
      executeScan(root, { format: 'json' }, {})

      expect(process.stdout.write).toHaveBeenCalledTimes(1)
    })

    it('returns 1 when a finding reaches the fail-on severity', () => {
      expect(executeScan(root, { failOn: 'high' }, { quiet: true })).toBe(1)
      expect(executeScan(root, { failOn: 'critical' }, { quiet: true })).toBe(0)
    })

    it('uses the scan settings of a plan', () => {
      const planPath = join(dir, 'plan.yaml')
      writeFileSync(planPath, 'version: "1.0"\nname: scan-plan\nscan:\n  exclude:\n    - "src/strbuffer.c"\n')

      expect(executeScan(root, { plan: planPath, failOn: 'low' }, { quiet: true })).toBe(0)
    })

    it('returns ERROR for a missing root', () => {
      expect(executeScan(join(dir, 'missing'), {}, {})).toBe(3)
    })

    it('returns ERROR for an invalid plan', () => {
      expect(executeScan(root, { plan: join(dir, 'missing.yaml') }, {})).toBe(3)
    })
  })
})
