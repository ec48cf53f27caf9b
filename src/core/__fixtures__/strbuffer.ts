/**
 * A string buffer translation unit whose append function copies without a
 * bounds check, and the corrected function.
 */

export const ORIGINAL_APPEND = [
  'int strbuffer_append_bytes(strbuffer_t *strbuff, const char *data, size_t size) {',
  '    if (size >= strbuff->size - strbuff->length) {',
  '        size_t new_size;',
  '        char *new_value;',
  '',
  '        new_size = max(strbuff->size * STRBUFFER_FACTOR, strbuff->length + size + 1);',
  '        new_value = jsonp_realloc(strbuff->value, strbuff->size, new_size);',
  '        if (!new_value)',
  '            return -1;',
  '',
  '        strbuff->value = new_value;',
  '        strbuff->size = new_size;',
  '    }',
  '',
  '    strcpy(strbuff->value + strbuff->length, data);',
  '    strbuff->length += size;',
  "    strbuff->value[strbuff->length] = '\\0';",
  '',
  '    return 0;',
  '}'
].join('\n')

export const PATCHED_APPEND = [
  'int strbuffer_append_bytes(strbuffer_t *strbuff, const char *data, size_t size) {',
  '    if (size >= strbuff->size - strbuff->length) {',
  '        size_t new_size;',
  '        char *new_value;',
  '',
  '        new_size = max(strbuff->size * STRBUFFER_FACTOR, strbuff->length + size + 1);',
  '        new_value = jsonp_realloc(strbuff->value, strbuff->size, new_size);',
  '        if (!new_value)',
  '            return -1;',
  '',
  '        strbuff->value = new_value;',
  '        strbuff->size = new_size;',
  '    }',
  '',
  '    if (strbuff->length + size >= strbuff->size)',
  '        return -1;',
  '',
  '    memcpy(strbuff->value + strbuff->length, data, size);',
  '    strbuff->length += size;',
  "    strbuff->value[strbuff->length] = '\\0';",
  '',
  '    return 0;',
  '}'
].join('\n')

const HEAD = [
  '#include <string.h>',
  '#include "strbuffer.h"',
  '',
  'int strbuffer_init(strbuffer_t *strbuff) {',
  '    strbuff->size = STRBUFFER_MIN_SIZE;',
  '    strbuff->length = 0;',
  '    strbuff->value = jsonp_malloc(strbuff->size);',
  '    if (!strbuff->value)',
  '        return -1;',
  "    strbuff->value[0] = '\\0';",
  '    return 0;',
  '}',
  '',
  'void strbuffer_close(strbuffer_t *strbuff) {',
  '    jsonp_free(strbuff->value);',
  '    strbuff->value = NULL;',
  '}',
  ''
].join('\n')

const TAIL = [
  '',
  'char strbuffer_pop(strbuffer_t *strbuff) {',
  '    if (strbuff->length > 0) {',
  '        char c = strbuff->value[--strbuff->length];',
  "        strbuff->value[strbuff->length] = '\\0';",
  '        return c;',
  '    }',
  "    return '\\0';",
  '}',
  ''
].join('\n')

/**
 * Lines 1-18 head, 19-38 ORIGINAL_APPEND, 39 blank, 40-47 strbuffer_pop, trailing newline
 */
export const STRBUFFER_C = `${HEAD}\n${ORIGINAL_APPEND}\n${TAIL}`

/** STRBUFFER_C with the append function corrected (lines 19-41) */
export const STRBUFFER_C_PATCHED = `${HEAD}\n${PATCHED_APPEND}\n${TAIL}`

export const APPEND_SIGNATURE =
  'int strbuffer_append_bytes(strbuffer_t *strbuff, const char *data, size_t size)'

export const BOUNDS_CHECK = 'if (strbuff->length + size >= strbuff->size)'

export function toCrlf(text: string): string {
  return text.replace(/\n/g, '\r\n')
}
