import { getCodecByName, listCodecs } from './codec/registry.js';
import { getConfigFromEnv, RegistryConfig } from './config.js';
import { createJsonlSink, JsonlSink, LogSink, noopSink } from './logging/jsonl.js';
import { buildProfiles } from './profiles/build.js';
import { loadProfiles } from './profiles/loader.js';
import { SerializationContext } from './serialization/context.js';
import { createDefaultContext } from './serialization/defaults.js';

export interface Contexts {
  config: RegistryConfig;
  /** The process-wide default, registered with every built-in handler. */
  base: SerializationContext;
  /** "default" plus every configured profile. */
  profiles: Map<string, SerializationContext>;
  /** Flushes and closes the JSONL log, if one was opened. */
  close(): Promise<void>;
}

/**
 * Build the default context and its profiles from configuration. The caller
 * owns the result and passes it to whatever serializes.
 */
export function createContexts(config: RegistryConfig = getConfigFromEnv(), log?: LogSink): Contexts {
  const fallback = getCodecByName(config.fallbackCodec);
  if (!fallback) {
    const known = listCodecs().map((c) => c.name).join(', ');
    throw new Error(`Unknown fallback codec "${config.fallbackCodec}" (available: ${known})`);
  }

  let jsonl: JsonlSink | null = null;
  if (!log && config.logPath) {
    jsonl = createJsonlSink(config.logPath);
  }

  const base = createDefaultContext({
    fallback,
    duplicateTags: config.duplicateTags,
    maxDepth: config.maxDepth,
    log: log ?? jsonl?.write ?? noopSink
  });

  const profiles = config.profilesPath
    ? buildProfiles(base, loadProfiles(config.profilesPath))
    : new Map([['default', base]]);

  return {
    config,
    base,
    profiles,
    close: () => (jsonl ? jsonl.close() : Promise.resolve())
  };
}
