// src/config/ConfigLookup.ts
/**
 * Read-only key/value configuration, looked up by dotted key
 * (e.g. "cors.allowed.list"). Callers read on every use; nothing is cached here.
 */

export interface ConfigLookup {
  get(key: string): string | undefined;
}

/** "cors.allowed.list" -> "CORS_ALLOWED_LIST" */
export function toEnvKey(key: string): string {
  return key
    .trim()
    .replace(/[^A-Za-z0-9]+/g, "_")
    .toUpperCase();
}

/** Backed by process.env (or any env-shaped record), read live. */
export class EnvConfig implements ConfigLookup {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  get(key: string): string | undefined {
    const v = this.env[toEnvKey(key)];
    return v == null || v.trim() === "" ? undefined : v;
  }
}

export class StaticConfig implements ConfigLookup {
  readonly #values: Map<string, string>;

  constructor(values: Record<string, string> = {}) {
    this.#values = new Map(Object.entries(values));
  }

  get(key: string): string | undefined {
    return this.#values.get(key);
  }

  set(key: string, value: string): this {
    this.#values.set(key, value);
    return this;
  }
}

export const CONFIG_KEYS = {
  corsAllowedList: "cors.allowed.list",
  jwtSecret: "jwt.secret",
} as const;
