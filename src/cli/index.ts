#!/usr/bin/env node
/**
 * patchwarden CLI entry point
 *
 * Scans C source trees, applies remediation plans and verifies the result
 */

import { realpathSync } from 'fs'
import { pathToFileURL } from 'url'
import { Command } from 'commander'
import { configureLogger, createLogger } from '../utils/logger.js'
import { createPlanLoader } from '../core/plan/loader.js'
import { initCommand, DEFAULT_OUTPUT_FILENAME } from './commands/init.js'
import { registerScanCommand } from './commands/scan.js'
import { registerFixCommand, registerVerifyCommand } from './commands/remediate.js'

/**
 * Exit codes for the CLI. A run exits with the worst outcome across files.
 * - 0: every patch applied or already present, every probe passed
 * - 1: a verification probe failed
 * - 2: a patch could not be applied (anchor missing or ambiguous, write failed)
 * - 3: error (plan invalid, root missing, file unreadable)
 */
export const ExitCode = {
  SUCCESS: 0,
  VERIFICATION_FAILED: 1,
  PATCH_FAILED: 2,
  ERROR: 3
} as const

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode]

/**
 * Global CLI options
 */
export interface GlobalOptions {
  verbose?: boolean
  quiet?: boolean
}

const logger = createLogger('cli')

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('patchwarden')
    .description('Scan C sources for unsafe patterns, patch functions and verify the fixes')
    .version('0.1.0')
    .option('-v, --verbose', 'Enable verbose output')
    .option('-q, --quiet', 'Suppress output except errors')
    .hook('preAction', () => {
      const globalOpts = program.opts<GlobalOptions>()
      configureLogger({
        quiet: globalOpts.quiet ?? false,
        level: globalOpts.verbose ? 'debug' : 'info'
      })
    })

  registerScanCommand(program)
  registerFixCommand(program)
  registerVerifyCommand(program)

  program
    .command('init')
    .description('Generate a starter remediation plan')
    .option('-o, --output <file>', 'Output file path', DEFAULT_OUTPUT_FILENAME)
    .option('--force', 'Overwrite existing file')
    .action((options: { output?: string; force?: boolean }) => {
      const result = initCommand({
        output: options.output,
        force: options.force
      })

      if (result.success) {
        logger.info(`Created plan file: ${result.outputPath}`)
        process.exit(ExitCode.SUCCESS)
      } else {
        logger.error(`Failed to create plan file: ${result.error}`)
        process.exit(ExitCode.ERROR)
      }
    })

  program
    .command('validate <plan>')
    .description('Validate a remediation plan file')
    .action((plan: string) => {
      const result = createPlanLoader().validate(plan)

      if (result.valid) {
        logger.info(`Plan file is valid: ${plan}`)
        process.exit(ExitCode.SUCCESS)
      } else {
        logger.error(`Plan file is invalid: ${plan}`)
        for (const error of result.errors) {
          logger.error(`  - ${error}`)
        }
        process.exit(ExitCode.ERROR)
      }
    })

  return program
}

/**
 * Run the CLI
 */
export async function run(args: string[] = process.argv): Promise<void> {
  const program = createProgram()

  try {
    await program.parseAsync(args)
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    logger.error(`CLI error: ${message}`)
    process.exit(ExitCode.ERROR)
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1]
  if (!entry) return false
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href
  } catch {
    return false
  }
}

// Run only when executed directly, including through the npm bin symlink
if (isMainModule()) {
  void run()
}
