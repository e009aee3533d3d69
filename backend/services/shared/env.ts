// backend/services/shared/env.ts

/**
 * Environment loading + typed getters shared by every service.
 *
 * Loading order (later wins): repo-root `.env` → service-root `.env`.
 * Values already present in the real environment are never overwritten,
 * so container/CI injection always beats files.
 *
 * Getters take the env map explicitly so config builders stay testable.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

export type EnvMap = Record<string, string | undefined>;

/** Walk up until a directory holding package.json is found. */
function findRepoRoot(start: string): string {
  let dir = path.resolve(start);
  for (;;) {
    if (fs.existsSync(path.join(dir, "package.json"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return path.resolve(start);
    dir = parent;
  }
}

/** Load one env file if present; returns true when it was read. */
function loadIfExists(absPath: string): boolean {
  if (!fs.existsSync(absPath)) return false;
  const parsed = dotenv.config({ path: absPath });
  if (parsed.error) {
    throw new Error(`Failed to load env file: ${absPath} (${parsed.error.message})`);
  }
  dotenvExpand.expand(parsed);
  return true;
}

/**
 * Cascading loader for a service. Accepts the service root or any dir inside
 * it (e.g. its `src`). Returns the files that were actually loaded.
 */
export function loadEnvCascadeForService(serviceDirAbs: string): string[] {
  const servicePath = path.resolve(serviceDirAbs);
  const serviceRoot = fs.existsSync(path.join(servicePath, "src"))
    ? servicePath
    : path.dirname(servicePath);
  const repoRoot = findRepoRoot(serviceRoot);

  const candidates = [path.join(repoRoot, ".env"), path.join(serviceRoot, ".env")];

  // dotenv never overrides existing keys, so load the most specific file first.
  const loaded: string[] = [];
  for (const file of [...candidates].reverse()) {
    if (loadIfExists(file)) loaded.push(file);
  }
  return loaded.reverse();
}

function readRaw(env: EnvMap, name: string): string | undefined {
  const v = env[name];
  if (v == null) return undefined;
  const t = v.trim();
  return t === "" ? undefined : t;
}

export function envString(env: EnvMap, name: string, fallback: string): string {
  return readRaw(env, name) ?? fallback;
}

/** Non-negative integer (0 allowed: ephemeral port in tests). */
export function envInt(env: EnvMap, name: string, fallback: number): number {
  const raw = readRaw(env, name);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new Error(`Env var ${name} must be a non-negative integer, got "${raw}"`);
  }
  return Number(raw);
}

export function envPositiveInt(env: EnvMap, name: string, fallback: number): number {
  const n = envInt(env, name, fallback);
  if (n <= 0) throw new Error(`Env var ${name} must be greater than 0, got "${n}"`);
  return n;
}

export function envUrl(env: EnvMap, name: string, fallback: string): string {
  const v = envString(env, name, fallback);
  let u: URL;
  try {
    u = new URL(v);
  } catch {
    throw new Error(`Env ${name} must be a valid URL, got "${v}"`);
  }
  if (!/^https?:$/.test(u.protocol)) {
    throw new Error(`Env ${name} must be an http or https URL`);
  }
  // No trailing slash: callers append absolute paths.
  return v.replace(/\/+$/, "");
}

export function envEnum<T extends string>(
  env: EnvMap,
  name: string,
  allowed: readonly T[],
  fallback: T
): T {
  const v = readRaw(env, name);
  if (v === undefined) return fallback;
  const hit = allowed.find((a) => a === v);
  if (!hit) {
    throw new Error(`Invalid env var ${name}="${v}". Allowed: ${allowed.join(", ")}`);
  }
  return hit;
}

/** Mask credentials in connection strings before they reach a log line. */
export function redactUri(uri: string): string {
  try {
    const u = new URL(uri);
    if (u.password) u.password = "***";
    if (u.username) u.username = "***";
    return u.toString();
  } catch {
    return uri.replace(/\/\/([^@]+)@/, "//***:***@");
  }
}
