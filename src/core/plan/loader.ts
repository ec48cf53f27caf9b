import { readFileSync } from 'fs'
import { dirname, join, resolve } from 'path'
import yaml from 'js-yaml'
import { resolvePackageFile } from '../../utils/paths.js'
import {
  validatePlanSafe,
  formatValidationErrors,
  type Plan
} from './schema.js'

export const DEFAULT_PLAN_FILE = 'plans/default.yaml'

export interface LoaderOptions {
  basePath?: string
  allowExtends?: boolean
}

export class PlanLoader {
  private cache = new Map<string, Plan>()
  private basePath: string
  private allowExtends: boolean

  constructor(options: LoaderOptions = {}) {
    this.basePath = options.basePath ?? process.cwd()
    this.allowExtends = options.allowExtends ?? true
  }

  /**
   * Load plan from file path
   */
  load(planPath: string): Plan {
    return this.loadResolved(resolve(this.basePath, planPath), [])
  }

  /**
   * Load the plan bundled with the package
   */
  loadDefault(): Plan {
    return this.load(resolvePackageFile(DEFAULT_PLAN_FILE))
  }

  /**
   * Load plan from string content. `extends` is not followed.
   */
  loadFromString(content: string, source = '<string>'): Plan {
    return this.parse(content, source)
  }

  /**
   * Validate plan file without caching it
   */
  validate(planPath: string): { valid: boolean; errors: string[] } {
    try {
      const absolutePath = resolve(this.basePath, planPath)
      this.parse(this.readPlanFile(absolutePath), absolutePath)
      return { valid: true, errors: [] }
    } catch (error) {
      if (error instanceof PlanLoadError) {
        return { valid: false, errors: error.validationErrors }
      }
      return {
        valid: false,
        errors: [error instanceof Error ? error.message : String(error)]
      }
    }
  }

  /**
   * Clear the plan cache
   */
  clearCache(): void {
    this.cache.clear()
  }

  private loadResolved(absolutePath: string, chain: string[]): Plan {
    const cached = this.cache.get(absolutePath)
    if (cached) {
      return cached
    }

    if (chain.includes(absolutePath)) {
      throw new PlanLoadError(
        `Circular extends: ${[...chain, absolutePath].join(' -> ')}`,
        absolutePath,
        ['extends: circular reference']
      )
    }

    let plan = this.parse(this.readPlanFile(absolutePath), absolutePath)

    if (plan.extends && this.allowExtends) {
      const base = this.loadResolved(
        join(dirname(absolutePath), plan.extends),
        [...chain, absolutePath]
      )
      plan = mergePlan(base, plan)
    }

    this.cache.set(absolutePath, plan)
    return plan
  }

  private parse(content: string, source: string): Plan {
    let raw: unknown
    try {
      raw = yaml.load(content)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new PlanLoadError(`Invalid YAML in plan file: ${source}`, source, [reason])
    }

    const validation = validatePlanSafe(raw)
    if (!validation.success) {
      const errors = formatValidationErrors(validation.errors)
      throw new PlanLoadError(
        `Invalid plan file: ${source}\n${errors.join('\n')}`,
        source,
        errors
      )
    }
    return validation.data
  }

  private readPlanFile(absolutePath: string): string {
    try {
      return readFileSync(absolutePath, 'utf-8')
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? String(error.code) : 'UNKNOWN'
      throw new PlanLoadError(
        `Failed to read plan file: ${absolutePath}`,
        absolutePath,
        [code]
      )
    }
  }
}

function unique<T>(values: readonly T[]): T[] {
  return [...new Set(values)]
}

/**
 * Overlay a plan on its base. Patches with the same id and probes for the
 * same file are replaced by the overriding plan's; everything else is kept.
 */
export function mergePlan(base: Plan, override: Plan): Plan {
  const overriddenIds = new Set(override.patches.map(p => p.id))
  const overriddenFiles = new Set(override.probes.map(p => p.file))

  return {
    ...base,
    ...override,
    scan: {
      include: override.scan.include,
      exclude: unique([...base.scan.exclude, ...override.scan.exclude]),
      allow_list: unique([...base.scan.allow_list, ...override.scan.allow_list]),
      exceptions: [...base.scan.exceptions, ...override.scan.exceptions]
    },
    patches: [
      ...base.patches.filter(p => !overriddenIds.has(p.id)),
      ...override.patches
    ],
    probes: [
      ...base.probes.filter(p => !overriddenFiles.has(p.file)),
      ...override.probes
    ]
  }
}

/**
 * Custom error for plan loading failures
 */
export class PlanLoadError extends Error {
  constructor(
    message: string,
    public readonly planPath: string,
    public readonly validationErrors: string[]
  ) {
    super(message)
    this.name = 'PlanLoadError'
  }
}

/**
 * Create a default loader instance
 */
export function createPlanLoader(options?: LoaderOptions): PlanLoader {
  return new PlanLoader(options)
}
