import { join } from 'path'
import type { RepositoryStats } from '../../types/index.js'
import { buildFunctionTable } from '../locator/index.js'
import { getFiles, readFileContent } from './utils.js'

const HEADER_EXTENSIONS = new Set(['h', 'hpp'])
const DOC_EXTENSIONS = new Set(['md', 'rst', 'txt'])
const BUILD_EXTENSIONS = new Set(['am', 'ac', 'cmake', 'mk'])
const BUILD_FILES = new Set(['CMakeLists.txt', 'Makefile', 'configure'])

type FileKind = 'source' | 'header' | 'test' | 'documentation' | 'build' | 'other'

/**
 * Classify a relative path. Order matters: a C file under test/ is a source file.
 */
export function classifyFile(file: string): FileKind {
  const name = file.slice(file.lastIndexOf('/') + 1)
  const ext = name.includes('.') ? name.slice(name.lastIndexOf('.') + 1) : ''

  if (ext === 'c') return 'source'
  if (HEADER_EXTENSIONS.has(ext)) return 'header'
  if (file.toLowerCase().includes('test')) return 'test'
  if (BUILD_FILES.has(name) || BUILD_EXTENSIONS.has(ext)) return 'build'
  if (DOC_EXTENSIONS.has(ext)) return 'documentation'
  return 'other'
}

/**
 * Walk a tree and count files by kind, C source lines and function definitions
 */
export function collectStats(rootDir: string, exclude: readonly string[] = []): RepositoryStats {
  const stats: RepositoryStats = {
    totalFiles: 0,
    sourceFiles: 0,
    headerFiles: 0,
    testFiles: 0,
    documentationFiles: 0,
    buildFiles: 0,
    totalLines: 0,
    functions: 0
  }

  for (const file of getFiles(rootDir, { include: ['**'], exclude })) {
    stats.totalFiles++
    const kind = classifyFile(file)

    switch (kind) {
      case 'source':
        stats.sourceFiles++
        break
      case 'header':
        stats.headerFiles++
        break
      case 'test':
        stats.testFiles++
        break
      case 'documentation':
        stats.documentationFiles++
        break
      case 'build':
        stats.buildFiles++
        break
      case 'other':
        break
    }

    if (kind === 'source' || kind === 'header') {
      const content = readFileContent(join(rootDir, file))
      if (content === null || content.length === 0) continue
      stats.totalLines += content.split('\n').length - (content.endsWith('\n') ? 1 : 0)
      if (kind === 'source') {
        stats.functions += buildFunctionTable(content).size
      }
    }
  }

  return stats
}
