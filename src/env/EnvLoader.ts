// src/env/EnvLoader.ts
/**
 * Purpose:
 * - Deterministic env loading for the service, then one strict, typed read.
 *
 * Policy:
 * - Load order & precedence:
 *   1) <cwd>/.env                 (base)
 *   2) <cwd>/.env.<mode>          (OVERRIDES base)
 *   3) ENV_FILE (if provided)     (OVERRIDES both)
 * - Variables already present in process.env before loading are never
 *   overwritten by the base file.
 * - Missing/invalid required values fail fast with the offending key named.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

/** Uppercase-with-underscores guard; we don’t set weird keys. */
const VALID_KEY = /^[A-Z0-9_]+$/;

export type ApplyStats = {
  file: string;
  newKeys: number;
  overrides: number;
};

function readEnvFile(file: string): Record<string, string> | undefined {
  if (!fs.existsSync(file)) return undefined;
  return dotenv.parse(fs.readFileSync(file, "utf8"));
}

function applyEnvFromFile(file: string, override: boolean): ApplyStats | undefined {
  const kv = readEnvFile(file);
  if (!kv) return undefined;
  let newKeys = 0;
  let overrides = 0;
  for (const [k, v] of Object.entries(kv)) {
    if (!VALID_KEY.test(k)) continue;
    const existed = Object.prototype.hasOwnProperty.call(process.env, k);
    if (!existed) {
      process.env[k] = v;
      newKeys++;
    } else if (override && process.env[k] !== v) {
      process.env[k] = v;
      overrides++;
    }
  }
  return { file, newKeys, overrides };
}

export function loadEnv(opts: { mode?: string; cwd?: string } = {}): ApplyStats[] {
  const cwd = opts.cwd ?? process.cwd();
  const mode = opts.mode ?? process.env.NODE_ENV ?? "development";

  const files: Array<{ file: string; override: boolean }> = [
    { file: path.join(cwd, ".env"), override: false },
    { file: path.join(cwd, `.env.${mode}`), override: true },
  ];
  const explicit = process.env.ENV_FILE?.trim();
  if (explicit) {
    files.push({
      file: path.isAbsolute(explicit) ? explicit : path.resolve(cwd, explicit),
      override: true,
    });
  }

  const applied: ApplyStats[] = [];
  for (const f of files) {
    const stats = applyEnvFromFile(f.file, f.override);
    if (stats) applied.push(stats);
  }
  return applied;
}

const LogLevel = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export const EnvSchema = z.object({
  NODE_ENV: z.string().trim().default("development"),
  LOG_LEVEL: LogLevel,
  SERVICE_NAME: z.string().trim().min(1).default("routegate"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
});

export type ServiceEnv = z.infer<typeof EnvSchema>;

/** Validated snapshot of process.env. Throws naming every bad key. */
export function readEnv(source: NodeJS.ProcessEnv = process.env): ServiceEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`ENV: invalid configuration (${detail})`);
  }
  return parsed.data;
}
