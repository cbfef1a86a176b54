// backend/services/shared/src/env/EnvLoader.ts
/**
 * Purpose:
 * - Deterministic env loading for the backend tree.
 * - Strict, typed accessors (presence + coercion + clear operator errors).
 *
 * Load order & precedence:
 *   1) REPO ROOT: .env, .env.<mode>         (base; never overrides process env)
 *   2) SERVICE-LOCAL: .env, .env.<mode>     (overrides root)
 *   3) ENV_FILE (if provided)               (overrides root & service)
 *
 * Accessors read from an injectable source (process.env by default) so tests
 * can pass a plain object.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

export type EnvMode = "dev" | "test" | "production" | string;
export type EnvSource = Record<string, string | undefined>;

/** Uppercase-with-underscores guard; we don't set weird keys. */
const VALID_KEY = /^[A-Z0-9_]+$/;

export type ApplyStats = {
  file: string;
  newKeys: number;
  overrides: number;
  totalKeys: number;
};

function readEnvFile(file: string): Record<string, string> {
  return dotenv.parse(fs.readFileSync(file, "utf8"));
}

function applyEnvFromFile(
  target: EnvSource,
  file: string,
  override: boolean
): ApplyStats {
  const kv = readEnvFile(file);
  let newKeys = 0;
  let overrides = 0;
  for (const [k, v] of Object.entries(kv)) {
    if (!VALID_KEY.test(k)) continue;
    const existed = Object.prototype.hasOwnProperty.call(target, k);
    if (!existed) {
      target[k] = v;
      newKeys++;
    } else if (override && target[k] !== v) {
      target[k] = v;
      overrides++;
    }
  }
  return { file, newKeys, overrides, totalKeys: Object.keys(kv).length };
}

export class EnvLoader {
  constructor(private readonly env: EnvSource = process.env) {}

  /** Walk up from startDir to the first directory holding a package.json. */
  static findRepoRoot(startDir: string = process.cwd()): string {
    let dir = path.resolve(startDir);
    while (true) {
      if (fs.existsSync(path.join(dir, "package.json"))) return dir;
      const parent = path.dirname(dir);
      if (parent === dir) return path.resolve(startDir);
      dir = parent;
    }
  }

  /**
   * Load env files root → service → ENV_FILE into the source.
   * Returns one summary per file actually applied.
   */
  loadAll(options: { serviceDir: string; repoRoot?: string }): ApplyStats[] {
    const serviceDir = path.resolve(options.serviceDir);
    const repoRoot = options.repoRoot ?? EnvLoader.findRepoRoot(serviceDir);
    const mode = (this.env.MODE ?? this.env.NODE_ENV ?? "dev").toLowerCase();

    const groups: Array<{ files: string[]; override: boolean }> = [
      {
        files: [
          path.join(repoRoot, ".env"),
          path.join(repoRoot, `.env.${mode}`),
        ],
        override: false,
      },
      {
        files: [
          path.join(serviceDir, ".env"),
          path.join(serviceDir, `.env.${mode}`),
        ],
        override: true,
      },
    ];

    const explicit = this.env.ENV_FILE;
    if (explicit) {
      groups.push({
        files: [
          path.isAbsolute(explicit) ? explicit : path.join(repoRoot, explicit),
        ],
        override: true,
      });
    }

    const seen = new Set<string>();
    const summaries: ApplyStats[] = [];
    for (const group of groups) {
      for (const f of group.files) {
        const abs = path.resolve(f);
        if (seen.has(abs) || !fs.existsSync(abs)) continue;
        seen.add(abs);
        summaries.push(applyEnvFromFile(this.env, abs, group.override));
      }
    }
    return summaries;
  }

  // ── Strict accessors ──────────────────────────────────────────────────────

  private raw(name: string): string | undefined {
    const v = this.env[name];
    if (v == null || v.trim() === "") return undefined;
    return v.trim();
  }

  reqString(name: string, opts?: { allowed?: readonly string[] }): string {
    const v = this.raw(name);
    if (v === undefined) {
      throw new Error(`ENV: ${name} is required but was not provided.`);
    }
    if (opts?.allowed && !opts.allowed.includes(v)) {
      throw new Error(
        `ENV: ${name} must be one of [${opts.allowed.join(
          ", "
        )}] (got: "${v}").`
      );
    }
    return v;
  }

  reqInt(name: string, opts?: { min?: number; max?: number }): number {
    const v = this.reqString(name);
    const n = Number(v);
    if (!Number.isInteger(n)) {
      throw new Error(`ENV: ${name} must be an integer (got: "${v}").`);
    }
    if (opts?.min != null && n < opts.min) {
      throw new Error(`ENV: ${name} must be >= ${opts.min} (got: ${n}).`);
    }
    if (opts?.max != null && n > opts.max) {
      throw new Error(`ENV: ${name} must be <= ${opts.max} (got: ${n}).`);
    }
    return n;
  }

  reqBool(name: string): boolean {
    const v = this.reqString(name).toLowerCase();
    if (["1", "true", "on", "yes"].includes(v)) return true;
    if (["0", "false", "off", "no"].includes(v)) return false;
    throw new Error(
      `ENV: ${name} must be boolean-like (true/false/on/off/1/0) (got: "${v}").`
    );
  }

  // Optionals (validate if present)
  optString(
    name: string,
    opts?: { allowed?: readonly string[] }
  ): string | undefined {
    return this.raw(name) === undefined
      ? undefined
      : this.reqString(name, opts);
  }

  optInt(
    name: string,
    opts?: { min?: number; max?: number }
  ): number | undefined {
    return this.raw(name) === undefined ? undefined : this.reqInt(name, opts);
  }

  optBool(name: string): boolean | undefined {
    return this.raw(name) === undefined ? undefined : this.reqBool(name);
  }
}

