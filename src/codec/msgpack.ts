import { Packr } from 'msgpackr';
import { enableTablePickling } from '../table/pickle.js';
import { ByteCodec } from './types.js';

enableTablePickling();

// Structured clone keeps Map, Set, Date, RegExp, Error, typed arrays and
// shared references intact; classes with a msgpackr extension keep their class.
// Records stay on: plain objects pack as records, so msgpack maps decode as Map.
const packr = new Packr({ structuredClone: true, moreTypes: true });

export const msgpackCodec: ByteCodec = {
  name: 'msgpack',
  encode(value: unknown): Uint8Array {
    return packr.pack(value);
  },
  decode(bytes: Uint8Array): unknown {
    return packr.unpack(bytes);
  }
};
