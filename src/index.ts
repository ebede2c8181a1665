export { SerializationContext, serialize, deserialize, typeNameOf, FALLBACK_TAG, DEFAULT_MAX_DEPTH } from './serialization/context.js';
export type { ContextOptions } from './serialization/context.js';
export { registerDefaultHandlers, createDefaultContext, createLightweightContext, TypedArrayBase } from './serialization/defaults.js';
export { toBuffer, fromBuffer } from './serialization/envelope.js';
export * from './serialization/errors.js';
export * from './serialization/types.js';
export type { ByteCodec } from './codec/types.js';
export { jsonCodec } from './codec/json.js';
export { msgpackCodec } from './codec/msgpack.js';
export { registerCodec, getCodecByName, listCodecs } from './codec/registry.js';
export { encodeTypedArray, decodeTypedArray, dtypeOf, isTypedArray } from './buffer/ndarray.js';
export type { TypedArray, DType, EncodedArray } from './buffer/ndarray.js';
export { Column, Table } from './table/table.js';
export type { ColumnValues } from './table/table.js';
export { tableToStructure, structureToTable, columnToStructure, structureToColumn } from './table/structural.js';
export { enableTablePickling } from './table/pickle.js';
export { ProfileLoader, loadProfiles, parseProfiles, BASE_PROFILE } from './profiles/loader.js';
export { buildProfiles } from './profiles/build.js';
export type { Profile, ProfilesConfig } from './profiles/types.js';
export { getConfigFromEnv } from './config.js';
export type { RegistryConfig } from './config.js';
export { createContexts } from './setup.js';
export type { Contexts } from './setup.js';
export { createJsonlSink, noopSink } from './logging/jsonl.js';
export type { LogSink, JsonlSink, RegistryLogEntry, RegistryEvent } from './logging/jsonl.js';
