import { Logger } from './utils/logger.js';

export interface SecretStore {
  get(name: string): Promise<string | undefined>;
}

/** Secrets from environment variables, optionally namespaced by a prefix. */
export class EnvSecretStore implements SecretStore {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env, private readonly prefix = '') {}

  async get(name: string): Promise<string | undefined> {
    const value = this.env[`${this.prefix}${name}`];
    return value === undefined || value === '' ? undefined : value;
  }
}

export class MemorySecretStore implements SecretStore {
  constructor(private readonly values: Record<string, string>) {}

  async get(name: string): Promise<string | undefined> {
    return this.values[name];
  }
}

/** Resolves the secrets a workflow declares, once per run. Missing ones are left out. */
export async function resolveSecrets(store: SecretStore, names: string[], log: Logger): Promise<Record<string, string>> {
  const out: Record<string, string> = {};
  for (const name of names) {
    const value = await store.get(name);
    if (value === undefined) {
      log.warn('secret not available', { secret: name });
      continue;
    }
    out[name] = value;
  }
  return out;
}

export function maskSecrets(text: string, values: readonly string[]): string {
  let out = text;
  for (const value of values) {
    if (value.length < 3) continue;
    out = out.split(value).join('***');
  }
  return out;
}
