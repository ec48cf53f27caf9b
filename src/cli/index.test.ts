import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { join } from 'path'
import { mkdtempSync, rmSync, existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs'
import { tmpdir } from 'os'
import yaml from 'js-yaml'
import { createProgram, ExitCode } from './index.js'
import { ORIGINAL_APPEND, PATCHED_APPEND, STRBUFFER_C, STRBUFFER_C_PATCHED } from '../core/__fixtures__/strbuffer.js'

const fixturesPath = join(import.meta.dirname, '../core/plan/__fixtures__')

async function parse(args: string[]): Promise<void> {
  try {
    await createProgram().parseAsync(['node', 'patchwarden', ...args])
  } catch {
    // process.exit is mocked to throw
  }
}

describe('CLI Framework', () => {
  beforeEach(() => {
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called')
    })
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('ExitCode', () => {
    it('should have correct exit codes', () => {
      expect(ExitCode.SUCCESS).toBe(0)
      expect(ExitCode.VERIFICATION_FAILED).toBe(1)
      expect(ExitCode.PATCH_FAILED).toBe(2)
      expect(ExitCode.ERROR).toBe(3)
    })
  })

  describe('createProgram', () => {
    it('should create a program with correct name and version', () => {
      const program = createProgram()

      expect(program.name()).toBe('patchwarden')
      expect(program.version()).toBe('0.1.0')
    })

    it('should have global options', () => {
      const optionNames = createProgram().options.map(opt => opt.long)

      expect(optionNames).toContain('--verbose')
      expect(optionNames).toContain('--quiet')
    })

    it('should register every command', () => {
      const names = createProgram().commands.map(cmd => cmd.name())

      expect(names).toEqual(['scan', 'fix', 'verify', 'init', 'validate'])
    })

    it('scan command should have its options', () => {
      const scanCmd = createProgram().commands.find(cmd => cmd.name() === 'scan')
      const options = scanCmd?.options.map(opt => opt.long)

      expect(options).toEqual(['--output', '--format', '--plan', '--fail-on'])
    })

    it('fix command should require a plan', () => {
      const fixCmd = createProgram().commands.find(cmd => cmd.name() === 'fix')
      const planOption = fixCmd?.options.find(opt => opt.long === '--plan')

      expect(planOption?.mandatory).toBe(true)
      expect(fixCmd?.options.map(opt => opt.long)).toContain('--dry-run')
    })
  })

  describe('validate command', () => {
    it('should exit with SUCCESS (0) for a valid plan file', async () => {
      await parse(['validate', join(fixturesPath, 'base.yaml')])

      expect(process.exit).toHaveBeenCalledWith(ExitCode.SUCCESS)
      expect(console.info).toHaveBeenCalledWith(expect.stringContaining('Plan file is valid'))
    })

    it('should exit with ERROR (3) for an invalid plan file', async () => {
      await parse(['validate', join(fixturesPath, 'invalid.yaml')])

      expect(process.exit).toHaveBeenCalledWith(ExitCode.ERROR)
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Plan file is invalid'))
    })

    it('should exit with ERROR (3) for a non-existent plan file', async () => {
      await parse(['validate', '/non-existent/plan.yaml'])

      expect(process.exit).toHaveBeenCalledWith(ExitCode.ERROR)
    })
  })

  describe('scan command', () => {
    it('should reject an unknown severity', async () => {
      await parse(['scan', '.', '--fail-on', 'severe'])

      expect(process.exit).toHaveBeenCalledWith(ExitCode.ERROR)
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Unknown severity: severe'))
    })
  })

  describe('fix and init commands', () => {
    let dir: string

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'pw-cli-'))
    })

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true })
    })

    it('should patch a tree and exit with SUCCESS (0)', async () => {
      const root = join(dir, 'tree')
      mkdirSync(join(root, 'src'), { recursive: true })
      writeFileSync(join(root, 'src', 'strbuffer.c'), STRBUFFER_C)
      const planPath = join(dir, 'plan.yaml')
      writeFileSync(planPath, yaml.dump({
        version: '1.0',
        name: 'cli-plan',
        patches: [{
          id: 'strbuffer-bounds',
          target_file: 'src/strbuffer.c',
          locator: { strategy: 'exact', anchor: ORIGINAL_APPEND },
          replacement: PATCHED_APPEND
        }]
      }, { lineWidth: -1 }))

      await parse(['-q', 'fix', root, '-p', planPath])

      expect(process.exit).toHaveBeenCalledWith(ExitCode.SUCCESS)
      expect(readFileSync(join(root, 'src', 'strbuffer.c'), 'utf-8')).toBe(STRBUFFER_C_PATCHED)
    })

    it('should write the default plan on init', async () => {
      const output = join(dir, 'plan.yaml')

      await parse(['init', '-o', output])

      expect(process.exit).toHaveBeenCalledWith(ExitCode.SUCCESS)
      expect(existsSync(output)).toBe(true)
    })
  })
})
