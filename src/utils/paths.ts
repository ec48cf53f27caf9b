import { existsSync } from 'fs'
import { dirname, join } from 'path'
import { fileURLToPath } from 'url'

const here = dirname(fileURLToPath(import.meta.url))

/**
 * Absolute path of a file shipped at the package root (e.g. plans/default.yaml).
 *
 * Walks up from this module, so it resolves the same way from src/ and from
 * the compiled dist/src/.
 */
export function resolvePackageFile(relativePath: string): string {
  let dir = here
  for (;;) {
    const candidate = join(dir, relativePath)
    if (existsSync(candidate)) {
      return candidate
    }
    const parent = dirname(dir)
    if (parent === dir) {
      throw new Error(`Package file not found: ${relativePath}`)
    }
    dir = parent
  }
}
