import { readFileSync, readdirSync, type Dirent } from 'fs'
import { join, relative, sep } from 'path'
import { minimatch } from 'minimatch'

export interface GetFilesOptions {
  /** Globs relative to the root; a file must match one */
  include?: readonly string[]
  /** Globs relative to the root; matching files and directories are skipped */
  exclude?: readonly string[]
}

export const DEFAULT_INCLUDE = ['**/*.c', '**/*.h'] as const

/**
 * Convert a platform path to forward slashes
 */
export function toPosix(path: string): string {
  return path.split(sep).join('/')
}

/**
 * Check if a relative path matches a glob. Dot files are matched too.
 */
export function matchesPattern(filePath: string, pattern: string): boolean {
  return minimatch(filePath, pattern, { dot: true, matchBase: !pattern.includes('/') })
}

/**
 * Recursively list files under rootDir as relative forward-slash paths,
 * in lexical order. Hidden directories and node_modules are never entered.
 */
export function getFiles(rootDir: string, options?: GetFilesOptions): string[] {
  const { include = DEFAULT_INCLUDE, exclude = [] } = options ?? {}
  const results: string[] = []

  const walk = (dirPath: string): void => {
    let entries: Dirent[]
    try {
      entries = readdirSync(dirPath, { withFileTypes: true })
    } catch {
      // unreadable directories contribute nothing
      return
    }

    for (const entry of entries) {
      const fullPath = join(dirPath, entry.name)
      const relPath = toPosix(relative(rootDir, fullPath))

      if (exclude.some(pattern => matchesPattern(relPath, pattern))) {
        continue
      }
      if (entry.isDirectory()) {
        if (!entry.name.startsWith('.') && entry.name !== 'node_modules') {
          walk(fullPath)
        }
      } else if (entry.isFile() && include.some(pattern => matchesPattern(relPath, pattern))) {
        results.push(relPath)
      }
    }
  }

  walk(rootDir)
  return results.sort()
}

/**
 * Read a file as UTF-8, replacing invalid bytes instead of failing.
 * Returns null if the file cannot be read.
 */
export function readFileContent(filePath: string): string | null {
  try {
    return readFileSync(filePath).toString('utf-8')
  } catch {
    return null
  }
}
