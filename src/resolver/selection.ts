/**
 * symdoc - Selection Cleaning
 * @module resolver/selection
 *
 * Reduces the text a user highlighted in a disassembly or decompiler view
 * to a bare symbol name.
 */

export interface SelectionPrefix {
  readonly prefix: string;
  readonly kind: string;
}

/**
 * Decorations stripped from the start of a selection. Only the first
 * prefix that matches is removed.
 */
export const SELECTION_PREFIXES: readonly SelectionPrefix[] = [
  { prefix: '__imp_', kind: 'import thunk' },
  { prefix: 'cs:', kind: 'code segment pointer' },
  { prefix: 'ds:', kind: 'data segment pointer' },
  { prefix: 'j_', kind: 'thunk jump' },
];

/**
 * Symbol name for a raw selection, or null when nothing usable is left
 *
 * @example
 * cleanSelection('j_CreateFile(hFile)') // 'CreateFile'
 * cleanSelection('ds:__imp_CloseHandle') // '__imp_CloseHandle'
 */
export function cleanSelection(
  raw: string | null | undefined,
  prefixes: readonly SelectionPrefix[] = SELECTION_PREFIXES
): string | null {
  if (!raw) return null;

  let name = raw;
  const match = prefixes.find((rule) => name.startsWith(rule.prefix));
  if (match) {
    name = name.slice(match.prefix.length);
  }

  // A call expression selected in the decompiler: keep the callee
  const paren = name.indexOf('(');
  if (paren !== -1) {
    name = name.slice(0, paren);
  }

  return name === '' ? null : name;
}
