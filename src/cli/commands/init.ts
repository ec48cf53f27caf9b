/**
 * init command - write a starter remediation plan
 */

import * as fs from 'fs'
import * as path from 'path'
import { resolvePackageFile } from '../../utils/paths.js'
import { DEFAULT_PLAN_FILE } from '../../core/plan/loader.js'

export const DEFAULT_OUTPUT_FILENAME = 'patchwarden.plan.yaml'

export interface InitOptions {
  output?: string
  force?: boolean
  /** Directory the output path is resolved against; defaults to cwd */
  cwd?: string
}

export interface InitResult {
  success: boolean
  outputPath?: string
  error?: string
}

/**
 * Execute the init command
 */
export function initCommand(options: InitOptions): InitResult {
  const outputPath = path.resolve(
    options.cwd ?? process.cwd(),
    options.output ?? DEFAULT_OUTPUT_FILENAME
  )

  try {
    if (fs.existsSync(outputPath) && !options.force) {
      return {
        success: false,
        outputPath,
        error: `File already exists: ${outputPath}. Use --force to overwrite.`
      }
    }

    const planContent = fs.readFileSync(resolvePackageFile(DEFAULT_PLAN_FILE), 'utf-8')

    fs.mkdirSync(path.dirname(outputPath), { recursive: true })
    fs.writeFileSync(outputPath, planContent, 'utf-8')

    return {
      success: true,
      outputPath
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    return {
      success: false,
      outputPath,
      error: message
    }
  }
}
