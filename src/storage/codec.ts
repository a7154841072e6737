/**
 * symdoc - Value Codecs
 * @module storage/codec
 *
 * Reversible per-value transforms applied before a document is stored.
 */

import { deflateSync, inflateSync } from 'node:zlib';

/**
 * Compression backend for stored documentation text
 *
 * `decompress(compress(text))` must return `text` unchanged.
 */
export interface Codec {
  /** Identifier written into the store file and checked on load */
  readonly name: string;
  compress(text: string): Buffer;
  decompress(data: Buffer): string;
}

/**
 * zlib deflate, the default backend
 */
export const deflateCodec: Codec = {
  name: 'deflate',
  compress: (text) => deflateSync(Buffer.from(text, 'utf-8')),
  decompress: (data) => inflateSync(data).toString('utf-8'),
};

/**
 * Stores UTF-8 bytes as they are. Handy when inspecting a store by hand.
 */
export const identityCodec: Codec = {
  name: 'identity',
  compress: (text) => Buffer.from(text, 'utf-8'),
  decompress: (data) => data.toString('utf-8'),
};

const codecs = new Map<string, Codec>([
  [deflateCodec.name, deflateCodec],
  [identityCodec.name, identityCodec],
]);

/**
 * Look up a registered codec by name
 */
export function getCodec(name: string): Codec | undefined {
  return codecs.get(name);
}

/**
 * Names of every registered codec
 */
export function codecNames(): string[] {
  return [...codecs.keys()];
}
