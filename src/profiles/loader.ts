import * as fs from 'fs';
import * as YAML from 'yaml';
import { Profile, PROFILES_VERSION, ProfilesConfig } from './types.js';

export const BASE_PROFILE = 'default';

export class ProfileLoader {
  load(path: string): ProfilesConfig {
    const content = fs.readFileSync(path, 'utf8');
    return this.parse(content);
  }

  parse(content: string): ProfilesConfig {
    const raw: unknown = YAML.parse(content);
    return this.validate(raw);
  }

  private validate(raw: unknown): ProfilesConfig {
    if (!isRecord(raw)) {
      throw new Error('Profile config must be a mapping');
    }

    const version = raw.version;
    if (!version) {
      throw new Error('Profile config missing required field: version');
    }

    if (version !== PROFILES_VERSION) {
      throw new Error(`Unsupported profile version: ${String(version)}`);
    }

    const entries = raw.profiles;
    if (!Array.isArray(entries)) {
      throw new Error('Profile config missing required field: profiles (must be array)');
    }

    const seen = new Set<string>([BASE_PROFILE]);
    const profiles: Profile[] = [];
    for (const entry of entries) {
      const profile = this.validateProfile(entry, seen);
      seen.add(profile.name);
      profiles.push(profile);
    }
    return { version: PROFILES_VERSION, profiles };
  }

  private validateProfile(entry: unknown, seen: Set<string>): Profile {
    if (!isRecord(entry)) {
      throw new Error('Profile must be a mapping');
    }

    const name = entry.name;
    if (typeof name !== 'string' || !name) {
      throw new Error('Profile missing required field: name');
    }

    if (seen.has(name)) {
      throw new Error(`Profile ${name}: duplicate name`);
    }

    const parent = entry.extends ?? BASE_PROFILE;
    if (typeof parent !== 'string' || !seen.has(parent)) {
      throw new Error(`Profile ${name}: extends unknown profile ${String(parent)}`);
    }

    const pickle = entry.pickle ?? [];
    if (!Array.isArray(pickle) || !pickle.every((tag): tag is string => typeof tag === 'string')) {
      throw new Error(`Profile ${name}: pickle must be an array of tags`);
    }

    return { name, extends: parent, pickle };
  }
}

export function loadProfiles(path: string): ProfilesConfig {
  const loader = new ProfileLoader();
  return loader.load(path);
}

export function parseProfiles(content: string): ProfilesConfig {
  const loader = new ProfileLoader();
  return loader.parse(content);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
