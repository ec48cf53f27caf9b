import { describe, it, expect } from 'vitest'
import { locate, locateExact, locateSignature, describeAnchor } from './index.js'
import {
  APPEND_SIGNATURE,
  ORIGINAL_APPEND,
  STRBUFFER_C,
  toCrlf
} from '../__fixtures__/strbuffer.js'

describe('locateExact', () => {
  it('locates a function by its verbatim text', () => {
    const result = locateExact(STRBUFFER_C, { strategy: 'exact', anchor: ORIGINAL_APPEND })

    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.match.span).toEqual({ startLine: 19, endLine: 38 })
      expect(STRBUFFER_C.slice(result.match.startOffset, result.match.endOffset)).toBe(ORIGINAL_APPEND)
    }
  })

  it('matches an LF anchor against a CRLF file', () => {
    const crlf = toCrlf(STRBUFFER_C)
    const result = locateExact(crlf, { strategy: 'exact', anchor: ORIGINAL_APPEND })

    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.match.span).toEqual({ startLine: 19, endLine: 38 })
      expect(crlf.slice(result.match.startOffset, result.match.endOffset)).toBe(toCrlf(ORIGINAL_APPEND))
    }
  })

  it('matches a verbatim anchor in a file with mixed line endings', () => {
    const crlfFunction = 'int g(void) {\r\n    return 1;\r\n}'
    const text = `int f(void) {\n    return 0;\n}\n${crlfFunction}\r\nint h(void) {\n}\n`
    const result = locateExact(text, { strategy: 'exact', anchor: crlfFunction })

    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.match.span).toEqual({ startLine: 4, endLine: 6 })
      expect(result.match.startOffset).toBe(30)
    }
  })

  it('reports AnchorNotFound when the anchor is absent', () => {
    const result = locateExact(STRBUFFER_C, {
      strategy: 'exact',
      anchor: 'int strbuffer_append(strbuffer_t *strbuff, const char *string) {'
    })

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.code).toBe('AnchorNotFound')
    }
  })

  it('reports AnchorAmbiguous with every matching line', () => {
    const text = `${ORIGINAL_APPEND}\n\n${ORIGINAL_APPEND}\n`
    const result = locateExact(text, { strategy: 'exact', anchor: ORIGINAL_APPEND })

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.code).toBe('AnchorAmbiguous')
      expect(result.error.message).toContain('occurs 2 times (lines 1, 22)')
    }
  })

  it('never matches in an empty file', () => {
    const result = locateExact('', { strategy: 'exact', anchor: 'int main(void) {' })

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.code).toBe('AnchorNotFound')
    }
  })

  it('never matches an empty anchor', () => {
    const result = locateExact(STRBUFFER_C, { strategy: 'exact', anchor: '' })

    expect(result.success).toBe(false)
  })
})

describe('locateSignature', () => {
  describe('column-zero-brace', () => {
    it('ends at the first closing brace in column 0', () => {
      const result = locateSignature(STRBUFFER_C, {
        strategy: 'signature',
        signature: APPEND_SIGNATURE,
        end: { mode: 'column-zero-brace' }
      })

      expect(result.success).toBe(true)
      if (result.success) {
        expect(result.match.span).toEqual({ startLine: 19, endLine: 38 })
        expect(STRBUFFER_C.slice(result.match.startOffset, result.match.endOffset)).toBe(ORIGINAL_APPEND)
      }
    })

    it('accepts the brace when the next line carries the gate text', () => {
      const text = STRBUFFER_C.replace('}\n\nchar strbuffer_pop', '}\nchar strbuffer_pop')
      const result = locateSignature(text, {
        strategy: 'signature',
        signature: APPEND_SIGNATURE,
        end: { mode: 'column-zero-brace', nextLineIncludes: 'strbuffer_pop' }
      })

      expect(result.success).toBe(true)
      if (result.success) {
        expect(result.match.span).toEqual({ startLine: 19, endLine: 38 })
      }
    })

    it('skips braces whose next line fails the gate', () => {
      const text = [
        'int a(void) {',
        '    if (x) {',
        '}',
        '    y();',
        '}',
        'int b(void) {',
        '    return 0;',
        '}'
      ].join('\n')

      const gated = locateSignature(text, {
        strategy: 'signature',
        signature: 'int a(void)',
        end: { mode: 'column-zero-brace', nextLineIncludes: 'int b' }
      })
      const ungated = locateSignature(text, {
        strategy: 'signature',
        signature: 'int a(void)',
        end: { mode: 'column-zero-brace' }
      })

      expect(gated.success && gated.match.span).toEqual({ startLine: 1, endLine: 5 })
      expect(ungated.success && ungated.match.span).toEqual({ startLine: 1, endLine: 3 })
    })

    it('fails closed when the gate is never satisfied before end of file', () => {
      const result = locateSignature(STRBUFFER_C, {
        strategy: 'signature',
        signature: APPEND_SIGNATURE,
        end: { mode: 'column-zero-brace', nextLineIncludes: 'strbuffer_pop' }
      })

      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error.code).toBe('AnchorNotFound')
        expect(result.error.message).toContain('followed by a line containing "strbuffer_pop"')
      }
    })

    it('fails closed when no closing brace follows', () => {
      const result = locateSignature('int f(void) {\n    return 0;\n  }\n', {
        strategy: 'signature',
        signature: 'int f(void)',
        end: { mode: 'column-zero-brace' }
      })

      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error.code).toBe('AnchorNotFound')
      }
    })

    it('allows trailing whitespace after the brace', () => {
      const result = locateSignature('int f(void) {\r\n    return 0;\r\n}  \r\n', {
        strategy: 'signature',
        signature: 'int f(void)',
        end: { mode: 'column-zero-brace' }
      })

      expect(result.success && result.match.span).toEqual({ startLine: 1, endLine: 3 })
    })
  })

  describe('brace-depth', () => {
    it('ends where the body brace depth returns to zero', () => {
      const result = locateSignature(STRBUFFER_C, {
        strategy: 'signature',
        signature: 'int strbuffer_init(',
        end: { mode: 'brace-depth' }
      })

      expect(result.success && result.match.span).toEqual({ startLine: 4, endLine: 12 })
    })

    it('ignores braces inside comments and literals', () => {
      const text = [
        'int f(const char *s) {',
        '    /* } */',
        '    if (s[0] == \'}\') {',
        '        puts("}}");',
        '    }',
        '    // }',
        '    return 0;',
        '    }',
        'int g(void);'
      ].join('\n')

      const result = locateSignature(text, {
        strategy: 'signature',
        signature: 'int f(',
        end: { mode: 'brace-depth' }
      })

      expect(result.success && result.match.span).toEqual({ startLine: 1, endLine: 8 })
    })

    it('handles a body brace on the line after the signature', () => {
      const text = 'static int\nparse(int a)\n{\n    return a;\n}\n'
      const result = locateSignature(text, {
        strategy: 'signature',
        signature: 'parse(int a)',
        end: { mode: 'brace-depth' }
      })

      expect(result.success && result.match.span).toEqual({ startLine: 2, endLine: 5 })
    })

    it('tracks a nested block from its own line', () => {
      const text = 'int f(void) {\n    if (x) {\n        y();\n    }\n    return 0;\n}\n'
      const result = locateSignature(text, {
        strategy: 'signature',
        signature: 'if (x)',
        end: { mode: 'brace-depth' }
      })

      expect(result.success && result.match.span).toEqual({ startLine: 2, endLine: 4 })
    })

    it('reports AnchorNotFound for an unbalanced body', () => {
      const result = locateSignature('int f(void) {\n    if (x) {\n        y();\n}\n', {
        strategy: 'signature',
        signature: 'int f(void)',
        end: { mode: 'brace-depth' }
      })

      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error.code).toBe('AnchorNotFound')
      }
    })
  })

  it('does not treat a prototype as a candidate', () => {
    const text = 'int foo(int a);\n\nint foo(int a) {\n    return a;\n}\n'
    const result = locateSignature(text, {
      strategy: 'signature',
      signature: 'int foo(int a)',
      end: { mode: 'brace-depth' }
    })

    expect(result.success && result.match.span).toEqual({ startLine: 3, endLine: 5 })
  })

  it('reports AnchorAmbiguous when the signature opens two definitions', () => {
    const text = '#ifdef A\nint foo(void) {\n}\n#else\nint foo(void) {\n}\n#endif\n'
    const result = locateSignature(text, {
      strategy: 'signature',
      signature: 'int foo(void)',
      end: { mode: 'column-zero-brace' }
    })

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.code).toBe('AnchorAmbiguous')
      expect(result.error.message).toContain('matches lines 2, 5')
    }
  })

  it('reports AnchorNotFound for an empty file', () => {
    const result = locateSignature('', {
      strategy: 'signature',
      signature: 'int foo(void)',
      end: { mode: 'brace-depth' }
    })

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.code).toBe('AnchorNotFound')
    }
  })
})

describe('locate', () => {
  it('dispatches on the locator strategy', () => {
    const exact = locate(STRBUFFER_C, { strategy: 'exact', anchor: ORIGINAL_APPEND })
    const signature = locate(STRBUFFER_C, {
      strategy: 'signature',
      signature: APPEND_SIGNATURE,
      end: { mode: 'brace-depth' }
    })

    expect(exact.success && exact.match).toEqual(signature.success && signature.match)
  })

  it('does not modify the text', () => {
    const text = `${STRBUFFER_C}`
    locate(text, { strategy: 'exact', anchor: ORIGINAL_APPEND })
    expect(text).toBe(STRBUFFER_C)
  })
})

describe('describeAnchor', () => {
  it('quotes the first non-blank line', () => {
    expect(describeAnchor('\n  int f(void) {\n}')).toBe('"int f(void) {"')
  })

  it('shortens long lines', () => {
    expect(describeAnchor(`int ${'x'.repeat(80)}(void) {`)).toBe(`"int ${'x'.repeat(53)}..."`)
  })
})
