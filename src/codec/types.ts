/**
 * A whole-value byte codec. Contexts use one as their catch-all; it must
 * accept any value a registered serializer might hand it.
 */
export interface ByteCodec {
  name: string; // 'msgpack' | 'json' | future
  encode(value: unknown): Uint8Array;
  decode(bytes: Uint8Array): unknown;
}
