/**
 * symdoc - Normalizer Module
 * @module normalizer
 */

export {
  type NormalizePass,
  NORMALIZE_PASSES,
  normalizeMarkdown,
  stripAnchorAndDivTags,
  collapseSpaces,
  tightenBlankLines,
  capitalizeDashHeadings,
  stripFunctionSuffix,
  removeSeeAlso,
  inlineLinksToBold,
  compactTables,
  styleTables,
  h3ToHeading,
} from './markdown-normalizer.js';
