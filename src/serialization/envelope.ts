import { Packr } from 'msgpackr';
import { InvalidEnvelopeError } from './errors.js';
import { Encoded, isPrimitive, isSerializedObject, SerializedObject } from './types.js';

// Plain msgpack: the tree holds only primitives, bytes, arrays and {tag, data}.
const packr = new Packr({ useRecords: false });

/** Pack a serialized tree into a single buffer for transport or storage. */
export function toBuffer(serialized: SerializedObject): Uint8Array {
  return packr.pack(serialized);
}

export function fromBuffer(bytes: Uint8Array): SerializedObject {
  let decoded: unknown;
  try {
    decoded = packr.unpack(bytes);
  } catch (e) {
    throw new InvalidEnvelopeError(e instanceof Error ? e.message : String(e));
  }
  assertSerializedObject(decoded, '$');
  return decoded;
}

function assertSerializedObject(value: unknown, where: string): asserts value is SerializedObject {
  if (!isSerializedObject(value)) {
    throw new InvalidEnvelopeError(`${where} is not a {tag, data} object`);
  }
  if (value.data instanceof Uint8Array) return;
  value.data.forEach((item, i) => assertEncoded(item, `${where}.data[${i}]`));
}

function assertEncoded(value: unknown, where: string): asserts value is Encoded {
  if (isPrimitive(value) || value instanceof Uint8Array) return;
  assertSerializedObject(value, where);
}
