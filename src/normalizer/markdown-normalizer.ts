/**
 * symdoc - Markdown Normalizer
 * @module normalizer/markdown-normalizer
 *
 * Rewrites the raw body of a documentation page into markup that renders
 * cleanly in a read-only, offline viewer. The rewrite is an ordered list of
 * pure passes; later passes rely on the output of earlier ones, so the
 * order of {@link NORMALIZE_PASSES} is part of the contract.
 */

// =============================================================================
// Types
// =============================================================================

export interface NormalizePass {
  readonly name: string;
  readonly apply: (text: string) => string;
}

// =============================================================================
// Passes
// =============================================================================

/**
 * 1. Drop `<a>` and `<div>` tags (opening, closing, self-closing), keeping
 *    the text between them
 */
export function stripAnchorAndDivTags(text: string): string {
  return text.replace(/<\/?(a|div)[^>]*>/g, '');
}

/**
 * 2. Runs of spaces become one space
 */
export function collapseSpaces(text: string): string {
  return text.replace(/ +/g, ' ');
}

const HEADING_LINE = /^#{1,6} /;

/**
 * 3. Remove line breaks between and before tags, cap blank-line runs at one
 *    blank line, and join lines that continue with a leading space. A
 *    markdown heading keeps the line breaks that end it.
 */
export function tightenBlankLines(text: string): string {
  return text
    .replace(/>[\n\r]+</g, '><')
    .replace(/([^\n\r]*)[\n\r]+</g, (match: string, line: string) =>
      HEADING_LINE.test(line) ? match : `${line}<`
    )
    .replace(/[\n\r]{2,}/g, '\n\n')
    .replaceAll('\n ', ' ');
}

/**
 * 4. `## -description` becomes `## Description`
 */
export function capitalizeDashHeadings(text: string): string {
  return text.replace(
    /# -(.+)/g,
    (_match, word: string) => `# ${word.charAt(0).toUpperCase()}${word.slice(1).toLowerCase()}`
  );
}

/**
 * 5. `# CreateFileA function` becomes `# CreateFileA`
 */
export function stripFunctionSuffix(text: string): string {
  return text.replace(/# (\S+) function/g, '# $1');
}

/**
 * 6. Remove the `## See-also` section up to the next heading
 */
export function removeSeeAlso(text: string): string {
  return text.replace(/## See-also[^#]+/g, '');
}

/**
 * 7. Links are not navigable offline: `[text](url)` becomes `**text**`
 */
export function inlineLinksToBold(text: string): string {
  return text.replace(/\[([^\]]+)\]\([^)]+\)/g, '**$1**');
}

/**
 * 8. Inside each `<table …</table>` span, blank lines become single line
 *    breaks. Spans are handled one at a time, from left to right.
 */
export function compactTables(text: string): string {
  let result = text;
  let offset = 0;

  for (;;) {
    const start = result.indexOf('<table', offset);
    if (start === -1) break;

    const end = result.indexOf('</table>', start);
    if (end === -1) break;

    const cleaned = result.slice(start, end).replaceAll('\n\n', '\n');
    result = result.slice(0, start) + cleaned + result.slice(end);
    offset = start + cleaned.length;
  }

  return result;
}

/**
 * 9. Drop the fixed column widths and give every table a border
 */
export function styleTables(text: string): string {
  return text
    .replaceAll(' width="40%"', '')
    .replaceAll(' width="60%"', '')
    .replaceAll('<table>', '<table border="1" cellspacing="0" cellpadding="3">');
}

/**
 * 10. `<h3>Remarks</h3>` becomes a `### Remarks` heading set off by blank
 *     lines. Line breaks already around the tag are absorbed.
 */
export function h3ToHeading(text: string): string {
  return text.replace(/[\n\r]*<h3>([^<]+)<\/h3>[\n\r]*/g, '\n\n### $1\n\n');
}

// =============================================================================
// Pipeline
// =============================================================================

export const NORMALIZE_PASSES: readonly NormalizePass[] = [
  { name: 'strip-anchor-and-div-tags', apply: stripAnchorAndDivTags },
  { name: 'collapse-spaces', apply: collapseSpaces },
  { name: 'tighten-blank-lines', apply: tightenBlankLines },
  { name: 'capitalize-dash-headings', apply: capitalizeDashHeadings },
  { name: 'strip-function-suffix', apply: stripFunctionSuffix },
  { name: 'remove-see-also', apply: removeSeeAlso },
  { name: 'inline-links-to-bold', apply: inlineLinksToBold },
  { name: 'compact-tables', apply: compactTables },
  { name: 'style-tables', apply: styleTables },
  { name: 'h3-to-heading', apply: h3ToHeading },
];

/**
 * Run every pass, in order, over a raw page body
 *
 * @example
 * normalizeMarkdown('## -remarks\n\nSee [CloseHandle](/x).')
 * // '## Remarks\n\nSee **CloseHandle**.'
 */
export function normalizeMarkdown(raw: string, passes: readonly NormalizePass[] = NORMALIZE_PASSES): string {
  return passes.reduce((text, pass) => pass.apply(text), raw);
}
