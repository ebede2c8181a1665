import { ByteCodec } from './types.js';

export const jsonCodec: ByteCodec = {
  name: 'json',
  encode(value: unknown): Uint8Array {
    const s = JSON.stringify(value) ?? 'null';
    return Buffer.from(s, 'utf8');
  },
  decode(bytes: Uint8Array): unknown {
    return JSON.parse(Buffer.from(bytes).toString('utf8'));
  }
};
