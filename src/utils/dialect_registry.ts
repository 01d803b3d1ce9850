import { dialectConfigurations } from '../dialects';
import { PolyglotDialectProfile, type DialectProfile } from './dialect_profile';

export class UnsupportedDialectError extends Error {
  constructor(public readonly dialect: string) {
    super(`Unsupported SQL dialect: ${dialect}`);
    this.name = 'UnsupportedDialectError';
  }
}

const profiles = new Map<string, PolyglotDialectProfile>();
const aliases = new Map<string, string>();

for (const config of Object.values(dialectConfigurations)) {
  profiles.set(config.name, new PolyglotDialectProfile(config, name => profiles.get(name)));
  aliases.set(config.name, config.name);
  for (const alias of config.aliases) {
    aliases.set(alias.toLowerCase(), config.name);
  }
}

/**
 * Maps a user-facing dialect spelling to its canonical name. Unknown names are
 * only lower-cased; they fail when a profile is requested.
 */
export function normalizeDialect(dialect: string): string {
  const lowered = dialect.trim().toLowerCase();
  return aliases.get(lowered) ?? lowered;
}

export function getDialectProfile(dialect: string): DialectProfile {
  const profile = profiles.get(normalizeDialect(dialect));
  if (!profile) {
    throw new UnsupportedDialectError(dialect);
  }
  return profile;
}

export function supportedDialects(): string[] {
  return [...profiles.keys()];
}
