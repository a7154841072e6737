/**
 * symdoc - Storage Module
 * @module storage
 *
 * Compressed key-value persistence with separate build and query sides.
 */

export {
  type Codec,
  deflateCodec,
  identityCodec,
  getCodec,
  codecNames,
} from './codec.js';

export {
  type StoreDocument,
  type StoreViewOptions,
  DEFAULT_STORE_FILE,
  serializeStore,
  deserializeStore,
  readStoreFile,
} from './store.js';

export { DocsStoreWriter } from './docs-writer.js';
export { DocsStoreView } from './docs-view.js';
