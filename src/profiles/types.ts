// typereg/v0 profile file

export const PROFILES_VERSION = 'typereg/v0';

export interface ProfilesConfig {
  version: string; // "typereg/v0"
  profiles: Profile[];
}

export interface Profile {
  name: string;
  extends?: string; // "default" or an earlier profile; defaults to "default"
  pickle?: string[]; // tags rebound to the fallback codec
}
