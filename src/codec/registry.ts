import { ByteCodec } from './types.js';
import { jsonCodec } from './json.js';
import { msgpackCodec } from './msgpack.js';

const codecs = new Map<string, ByteCodec>();

export function registerCodec(codec: ByteCodec) {
  codecs.set(codec.name, codec);
}

export function getCodecByName(name?: string | null): ByteCodec | undefined {
  if (!name) return undefined;
  return codecs.get(name.toLowerCase());
}

export function listCodecs(): ByteCodec[] {
  return Array.from(codecs.values());
}

// Bootstrap defaults
registerCodec(jsonCodec);
registerCodec(msgpackCodec);
