import { createHash } from 'crypto'
import { readFileSync, statSync } from 'fs'

/**
 * Calculate SHA-256 hash of a string or buffer
 */
export function hashContent(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex')
}

/**
 * Calculate SHA-256 hash of a file's raw bytes, or undefined when it cannot be read
 */
export function hashFile(filePath: string): string | undefined {
  try {
    return hashContent(readFileSync(filePath))
  } catch {
    return undefined
  }
}

/**
 * Check if a path is a directory
 */
export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory()
  } catch {
    return false
  }
}

/**
 * Check if a path is a file
 */
export function isFile(path: string): boolean {
  try {
    return statSync(path).isFile()
  } catch {
    return false
  }
}
