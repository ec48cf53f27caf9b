import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { initCommand, DEFAULT_OUTPUT_FILENAME } from './init.js'
import { resolvePackageFile } from '../../utils/paths.js'

describe('init command', () => {
  let dir: string
  const defaultPlan = readFileSync(resolvePackageFile('plans/default.yaml'), 'utf-8')

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pw-init-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  describe('DEFAULT_OUTPUT_FILENAME', () => {
    it('should be patchwarden.plan.yaml', () => {
      expect(DEFAULT_OUTPUT_FILENAME).toBe('patchwarden.plan.yaml')
    })
  })

  describe('initCommand', () => {
    it('should create the plan file at the default location', () => {
      const result = initCommand({ cwd: dir })

      expect(result).toEqual({ success: true, outputPath: join(dir, 'patchwarden.plan.yaml') })
      expect(readFileSync(join(dir, 'patchwarden.plan.yaml'), 'utf-8')).toBe(defaultPlan)
    })

    it('should create the plan file at a custom location', () => {
      const result = initCommand({ cwd: dir, output: 'plans/custom.yaml' })

      expect(result.success).toBe(true)
      expect(result.outputPath).toBe(join(dir, 'plans', 'custom.yaml'))
      expect(readFileSync(join(dir, 'plans', 'custom.yaml'), 'utf-8')).toBe(defaultPlan)
    })

    it('should fail if the file exists without force', () => {
      writeFileSync(join(dir, DEFAULT_OUTPUT_FILENAME), 'keep me\n')

      const result = initCommand({ cwd: dir })

      expect(result.success).toBe(false)
      expect(result.error).toContain('already exists')
      expect(readFileSync(join(dir, DEFAULT_OUTPUT_FILENAME), 'utf-8')).toBe('keep me\n')
    })

    it('should overwrite the file with force', () => {
      writeFileSync(join(dir, DEFAULT_OUTPUT_FILENAME), 'old\n')

      const result = initCommand({ cwd: dir, force: true })

      expect(result.success).toBe(true)
      expect(readFileSync(join(dir, DEFAULT_OUTPUT_FILENAME), 'utf-8')).toBe(defaultPlan)
    })
  })
})
