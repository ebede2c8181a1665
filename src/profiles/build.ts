import { SerializationContext } from '../serialization/context.js';
import { UnregisteredTagError } from '../serialization/errors.js';
import { BASE_PROFILE } from './loader.js';
import { ProfilesConfig } from './types.js';

/**
 * Derive one context per profile. Each is a clone of its parent with the
 * listed tags rebound to the fallback codec; parents are never mutated.
 */
export function buildProfiles(base: SerializationContext, config: ProfilesConfig): Map<string, SerializationContext> {
  const contexts = new Map<string, SerializationContext>([[BASE_PROFILE, base]]);

  for (const profile of config.profiles) {
    const parent = contexts.get(profile.extends ?? BASE_PROFILE);
    if (!parent) {
      throw new Error(`Profile ${profile.name}: extends unknown profile ${profile.extends}`);
    }

    const context = parent.clone({ name: profile.name });
    for (const tag of profile.pickle ?? []) {
      const type = parent.typeForTag(tag);
      if (!type) throw new UnregisteredTagError(tag);
      context.registerType(type, tag, { pickle: true });
    }
    contexts.set(profile.name, context);
    console.log(`[Profiles] Built ${profile.name} from ${profile.extends ?? BASE_PROFILE}: ${(profile.pickle ?? []).length} pickled tags`);
  }

  return contexts;
}
