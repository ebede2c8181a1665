// Contiguous buffers for typed arrays. Bytes are copied in host byte order.

export type TypedArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array
  | BigInt64Array
  | BigUint64Array;

export type DType =
  | 'int8'
  | 'uint8'
  | 'uint8clamped'
  | 'int16'
  | 'uint16'
  | 'int32'
  | 'uint32'
  | 'float32'
  | 'float64'
  | 'int64'
  | 'uint64';

export interface EncodedArray {
  dtype: DType;
  bytes: Uint8Array;
}

const BYTES_PER_ELEMENT: Record<DType, number> = {
  int8: 1,
  uint8: 1,
  uint8clamped: 1,
  int16: 2,
  uint16: 2,
  int32: 4,
  uint32: 4,
  float32: 4,
  float64: 8,
  int64: 8,
  uint64: 8
};

export function isDType(value: unknown): value is DType {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(BYTES_PER_ELEMENT, value);
}

export function isTypedArray(value: unknown): value is TypedArray {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

export function dtypeOf(array: TypedArray): DType {
  // Checked most-derived first: Buffer and other subclasses report their base.
  if (array instanceof Int8Array) return 'int8';
  if (array instanceof Uint8ClampedArray) return 'uint8clamped';
  if (array instanceof Uint8Array) return 'uint8';
  if (array instanceof Int16Array) return 'int16';
  if (array instanceof Uint16Array) return 'uint16';
  if (array instanceof Int32Array) return 'int32';
  if (array instanceof Uint32Array) return 'uint32';
  if (array instanceof Float32Array) return 'float32';
  if (array instanceof Float64Array) return 'float64';
  if (array instanceof BigInt64Array) return 'int64';
  return 'uint64';
}

export function encodeTypedArray(array: TypedArray): EncodedArray {
  const bytes = new Uint8Array(array.byteLength);
  bytes.set(new Uint8Array(array.buffer, array.byteOffset, array.byteLength));
  return { dtype: dtypeOf(array), bytes };
}

export function decodeTypedArray(dtype: string, bytes: Uint8Array): TypedArray {
  if (!isDType(dtype)) {
    throw new TypeError(`Unknown dtype "${dtype}"`);
  }
  const width = BYTES_PER_ELEMENT[dtype];
  if (bytes.byteLength % width !== 0) {
    throw new RangeError(`Buffer of ${bytes.byteLength} bytes is not a whole number of ${dtype} elements`);
  }
  // Copy to a fresh, aligned buffer; the input may be a view at any offset.
  // Not bytes.slice(): on a Buffer that returns a view of the same memory.
  const copy = new Uint8Array(bytes.byteLength);
  copy.set(bytes);
  const buffer = copy.buffer;
  const length = bytes.byteLength / width;
  switch (dtype) {
    case 'int8': return new Int8Array(buffer, 0, length);
    case 'uint8': return new Uint8Array(buffer, 0, length);
    case 'uint8clamped': return new Uint8ClampedArray(buffer, 0, length);
    case 'int16': return new Int16Array(buffer, 0, length);
    case 'uint16': return new Uint16Array(buffer, 0, length);
    case 'int32': return new Int32Array(buffer, 0, length);
    case 'uint32': return new Uint32Array(buffer, 0, length);
    case 'float32': return new Float32Array(buffer, 0, length);
    case 'float64': return new Float64Array(buffer, 0, length);
    case 'int64': return new BigInt64Array(buffer, 0, length);
    case 'uint64': return new BigUint64Array(buffer, 0, length);
  }
}
