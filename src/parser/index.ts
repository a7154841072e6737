/**
 * symdoc - Parser Module
 *
 * @module parser
 */

export * from './types.js';
export { NAME_RULES, findNameViolation, type NameRule } from './name-rules.js';
export {
  FRONT_MATTER_DELIMITER,
  readSourceText,
  splitFrontMatter,
  extractSymbolName,
  readApiDoc,
  parseApiDoc,
} from './api-doc-parser.js';
