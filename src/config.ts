import { DEFAULT_MAX_DEPTH } from './serialization/context.js';
import { DuplicateTagPolicy } from './serialization/types.js';

export interface RegistryConfig {
  fallbackCodec: string;
  maxDepth: number;
  duplicateTags: DuplicateTagPolicy;
  logPath?: string;
  profilesPath?: string;
}

const DUPLICATE_POLICIES: readonly DuplicateTagPolicy[] = ['overwrite', 'warn', 'error'];

export function getConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RegistryConfig {
  const maxDepth = parseInt(env.TYPEREG_MAX_DEPTH || String(DEFAULT_MAX_DEPTH), 10);
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new Error(`TYPEREG_MAX_DEPTH must be a positive integer, got ${env.TYPEREG_MAX_DEPTH}`);
  }

  const policy = (env.TYPEREG_DUPLICATE_TAGS || 'warn').toLowerCase();
  const duplicateTags = DUPLICATE_POLICIES.find((p) => p === policy);
  if (!duplicateTags) {
    throw new Error(`TYPEREG_DUPLICATE_TAGS must be one of ${DUPLICATE_POLICIES.join(', ')}, got ${policy}`);
  }

  return {
    fallbackCodec: (env.TYPEREG_FALLBACK_CODEC || 'msgpack').toLowerCase(),
    maxDepth,
    duplicateTags,
    logPath: env.TYPEREG_LOG || undefined,
    profilesPath: env.TYPEREG_PROFILES || undefined
  };
}
