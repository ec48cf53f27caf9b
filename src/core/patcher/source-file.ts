import { randomBytes } from 'crypto'
import { existsSync, readFileSync, renameSync, rmSync, statSync, writeFileSync } from 'fs'
import { basename, dirname, join } from 'path'
import type { EndMarker, Locator, PatchSpec } from '../../types/index.js'

export type SourceEncoding = 'utf-8' | 'latin1'

/**
 * A file's complete content, read into memory
 */
export interface SourceFile {
  path: string
  text: string
  /**
   * latin1 when the bytes are not valid UTF-8, so that writing the text back
   * reproduces every byte the patch did not touch
   */
  encoding: SourceEncoding
}

/**
 * Filesystem write failed after the new content was computed.
 * The target file still holds its previous content.
 */
export class WriteFailureError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message)
    this.name = 'WriteFailureError'
  }
}

export function readSourceFile(path: string): SourceFile {
  const bytes = readFileSync(path)
  const text = bytes.toString('utf-8')
  if (Buffer.from(text, 'utf-8').equals(bytes)) {
    return { path, text, encoding: 'utf-8' }
  }
  return { path, text: bytes.toString('latin1'), encoding: 'latin1' }
}

/**
 * Plan text as it appears in a file's decoded text. A latin1-decoded file
 * holds the UTF-8 bytes of non-ASCII text as one character per byte, so
 * writing it back emits those bytes unchanged.
 */
export function encodeForSource(text: string, encoding: SourceEncoding): string {
  return encoding === 'latin1' ? Buffer.from(text, 'utf-8').toString('latin1') : text
}

/**
 * A file's decoded text as the scanner and verifier read it from disk
 */
export function decodeFromSource(text: string, encoding: SourceEncoding): string {
  return encoding === 'latin1' ? Buffer.from(text, 'latin1').toString('utf-8') : text
}

/**
 * A PatchSpec with every text it searches for or inserts expressed in the
 * file's encoding
 */
export function specForSource(spec: PatchSpec, encoding: SourceEncoding): PatchSpec {
  if (encoding === 'utf-8') {
    return spec
  }
  const encode = (text: string): string => encodeForSource(text, encoding)

  let locator: Locator
  if (spec.locator.strategy === 'exact') {
    locator = { strategy: 'exact', anchor: encode(spec.locator.anchor) }
  } else {
    const { end } = spec.locator
    const encodedEnd: EndMarker = end.mode === 'column-zero-brace' && end.nextLineIncludes !== undefined
      ? { mode: 'column-zero-brace', nextLineIncludes: encode(end.nextLineIncludes) }
      : end
    locator = { strategy: 'signature', signature: encode(spec.locator.signature), end: encodedEnd }
  }

  return { ...spec, locator, replacement: encode(spec.replacement) }
}

/**
 * Replace a file's whole content atomically: write a temporary sibling,
 * then rename it over the target. Readers see the old or the new file,
 * never a partial one.
 */
export function writeFileAtomic(
  filePath: string,
  content: string,
  encoding: SourceEncoding = 'utf-8'
): void {
  const tempPath = join(
    dirname(filePath),
    `.${basename(filePath)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`
  )

  try {
    const mode = statSync(filePath, { throwIfNoEntry: false })?.mode
    writeFileSync(tempPath, content, { encoding, mode })
    renameSync(tempPath, filePath)
  } catch (error) {
    if (existsSync(tempPath)) {
      rmSync(tempPath, { force: true })
    }
    const reason = error instanceof Error ? error.message : String(error)
    throw new WriteFailureError(`Failed to write ${filePath}: ${reason}`, filePath)
  }
}

export function writeSourceFile(file: SourceFile): void {
  writeFileAtomic(file.path, file.text, file.encoding)
}
