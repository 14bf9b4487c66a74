import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "yaml";
import { z } from "zod";

import { UsageError, ValidationError } from "./errors";
import { log, resetLogger } from "./utils/logger";
import type { CanonkeyInit } from "./types";

/** Runtime validation for merged configuration. */
const ConfigSchema = z.object({
  hashAlgo: z.enum(["blake3", "sha256"]),
  logLevel: z.enum(["error", "warn", "info", "verbose", "debug", "silly"]),
  metrics: z.boolean(),
});

const defaults: CanonkeyInit = {
  hashAlgo: "blake3",
  logLevel: "info",
  metrics: true,
};

function readYaml(filePath: string): Partial<CanonkeyInit> {
  const abs = path.resolve(process.cwd(), filePath);

  if (!fs.existsSync(abs)) return {};
  const raw = fs.readFileSync(abs, "utf8");
  const parsed: unknown = yaml.parse(raw);
  if (parsed === null || parsed === undefined) return {};

  const result = ConfigSchema.partial().safeParse(parsed);
  if (!result.success) {
    throw new ValidationError(
      `canonkey: invalid rc file ${abs}: ${result.error.message}`,
      result.error.issues
    );
  }
  return result.data;
}

// Environment values arrive as strings
function parseFlag(raw: string): boolean | string {
  if (/^(1|true|yes|on)$/i.test(raw)) return true;
  if (/^(0|false|no|off)$/i.test(raw)) return false;
  return raw;
}

function readEnv(): Record<string, unknown> {
  return {
    ...(process.env["CANONKEY_HASH_ALGO"] && {
      hashAlgo: process.env["CANONKEY_HASH_ALGO"],
    }),
    ...(process.env["CANONKEY_LOG_LEVEL"] && {
      logLevel: process.env["CANONKEY_LOG_LEVEL"],
    }),
    ...(process.env["CANONKEY_METRICS"] && {
      metrics: parseFlag(process.env["CANONKEY_METRICS"]),
    }),
  };
}

class ConfigManagerClass {
  private _cfg?: Readonly<CanonkeyInit>;
  /** Set once the first digest is computed; stored keys pin the algorithm. */
  private _sealed = false;

  load(userCfg: Partial<CanonkeyInit> = {}): Readonly<CanonkeyInit> {
    const fileCfg = process.env["CANONKEY_RC"]
      ? readYaml(process.env["CANONKEY_RC"])
      : {};

    const merged = {
      ...defaults,
      ...fileCfg,
      ...readEnv(),
      ...userCfg,
    };

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ValidationError(
        `canonkey: invalid configuration: ${result.error.message}`,
        result.error.issues
      );
    }

    if (this._sealed && this._cfg && this._cfg.hashAlgo !== result.data.hashAlgo) {
      throw new UsageError(
        `canonkey: hashAlgo cannot change from ${this._cfg.hashAlgo} to ${result.data.hashAlgo} after digests have been computed`
      );
    }

    this._cfg = Object.freeze(result.data);
    return this._cfg;
  }

  /** Algorithm for the next digest; pins it for the rest of the process. */
  hashAlgo(): CanonkeyInit["hashAlgo"] {
    const { hashAlgo } = this.cfg;
    this._sealed = true;
    return hashAlgo;
  }

  /** Current settings; defaults (plus rc file and environment) on first use. */
  get cfg(): Readonly<CanonkeyInit> {
    return this._cfg ?? this.load();
  }

  /** Drops loaded settings and the algorithm pin. Intended for tests. */
  reset(): void {
    this._cfg = undefined;
    this._sealed = false;
  }
}

export const ConfigManager = new ConfigManagerClass();

/**
 * (Re)configures the library. Digests depend on `hashAlgo`, so it can only
 * change before the first digest is computed; keys persisted under one
 * algorithm are not found under the other.
 */
export function configure(cfg: Partial<CanonkeyInit> = {}): Readonly<CanonkeyInit> {
  const loaded = ConfigManager.load(cfg);
  resetLogger();
  log.verbose("canonkey configured", { ...loaded });
  return loaded;
}
