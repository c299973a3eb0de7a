/**
 * Splitter configuration
 *
 * Layering: defaults < environment (IDSPLIT_*) < YAML file < explicit overrides.
 * Relative paths inside the YAML file resolve against the file's directory;
 * paths from the environment or overrides resolve against `cwd`.
 */

import fs from "node:fs";
import path from "node:path";

import { parse } from "yaml";
import { z } from "zod";

import { DEFAULT_SCORE_FLOOR } from "../splitter/same-case.js";
import { DEFAULT_MAX_LENGTH } from "../splitter/samurai.js";
import { DEFAULT_NOISE_THRESHOLD } from "../splitter/scoring.js";

import { DEFAULT_LOG_LEVEL, isLogLevel, LOG_LEVELS, type LogLevel } from "./logger.js";

const CONFIG_CANDIDATES = [
  ".idsplit/config.yml",
  ".idsplit/config.yaml",
  "config/idsplit.yml",
  "config/idsplit.yaml",
];

// ============================================================
// Types
// ============================================================

export interface SplitterConfig {
  /** Frequency table path, or null when none is configured */
  frequencies: string | null;
  /** Word-list files backing the dictionary oracle */
  dictionary: string[];
  noiseThreshold: number;
  scoreFloor: number;
  maxIdentifierLength: number;
  keepDigits: boolean;
  logLevel: LogLevel;
  affixes: {
    prefixes: string[];
    suffixes: string[];
  };
  /** YAML file the values were read from, if any */
  source: string | null;
}

export type ConfigOverrides = Partial<Omit<SplitterConfig, "affixes" | "source">>;

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

// ============================================================
// Schema
// ============================================================

const PathSchema = z.string().trim().min(1);

const ConfigFileSchema = z
  .object({
    frequencies: PathSchema.optional(),
    dictionary: z.union([PathSchema, z.array(PathSchema)]).optional(),
    noise_threshold: z.number().finite().nonnegative().optional(),
    score_floor: z.number().finite().positive().optional(),
    max_identifier_length: z.number().int().positive().optional(),
    keep_digits: z.boolean().optional(),
    log_level: z.enum(LOG_LEVELS).optional(),
    affixes: z
      .object({
        prefixes: z.array(z.string().trim().min(1)).default([]),
        suffixes: z.array(z.string().trim().min(1)).default([]),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export function defaultConfig(): SplitterConfig {
  return {
    frequencies: null,
    dictionary: [],
    noiseThreshold: DEFAULT_NOISE_THRESHOLD,
    scoreFloor: DEFAULT_SCORE_FLOOR,
    maxIdentifierLength: DEFAULT_MAX_LENGTH,
    keepDigits: true,
    logLevel: DEFAULT_LOG_LEVEL,
    affixes: { prefixes: [], suffixes: [] },
    source: null,
  };
}

// ============================================================
// Environment
// ============================================================

function parseEnvNumber(key: string, value: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed.length === 0 || !Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid value for ${key}: ${value} → expected a non-negative number`);
  }
  return parsed;
}

function parseEnvPaths(value: string, cwd: string): string[] {
  return value
    .split(path.delimiter)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => path.resolve(cwd, entry));
}

function applyEnv(config: SplitterConfig, env: NodeJS.ProcessEnv, cwd: string): void {
  const frequencies = env.IDSPLIT_FREQUENCIES?.trim();
  if (frequencies) {
    config.frequencies = path.resolve(cwd, frequencies);
  }
  if (env.IDSPLIT_DICTIONARY) {
    config.dictionary = parseEnvPaths(env.IDSPLIT_DICTIONARY, cwd);
  }
  if (env.IDSPLIT_NOISE_THRESHOLD !== undefined) {
    config.noiseThreshold = parseEnvNumber("IDSPLIT_NOISE_THRESHOLD", env.IDSPLIT_NOISE_THRESHOLD);
  }
  if (env.IDSPLIT_MAX_LENGTH !== undefined) {
    const limit = parseEnvNumber("IDSPLIT_MAX_LENGTH", env.IDSPLIT_MAX_LENGTH);
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`Invalid value for IDSPLIT_MAX_LENGTH: ${env.IDSPLIT_MAX_LENGTH} → expected a positive integer`);
    }
    config.maxIdentifierLength = limit;
  }
  const level = env.IDSPLIT_LOG_LEVEL?.trim().toLowerCase();
  if (level) {
    if (!isLogLevel(level)) {
      throw new Error(
        `Invalid value for IDSPLIT_LOG_LEVEL: ${level} → expected one of ${LOG_LEVELS.join(", ")}`
      );
    }
    config.logLevel = level;
  }
}

// ============================================================
// YAML file
// ============================================================

function resolveConfigPath(
  configPath: string | undefined,
  cwd: string,
  env: NodeJS.ProcessEnv
): string | null {
  const explicit = configPath ?? env.IDSPLIT_CONFIG;
  if (explicit) {
    const resolved = path.resolve(cwd, explicit);
    if (!fs.existsSync(resolved)) {
      throw new Error(`Config file not found at ${resolved} → check the path or remove the option`);
    }
    return resolved;
  }
  for (const candidate of CONFIG_CANDIDATES) {
    const fullPath = path.join(cwd, candidate);
    if (fs.existsSync(fullPath)) {
      return fullPath;
    }
  }
  return null;
}

function readConfigFile(filePath: string): ConfigFile {
  const raw = fs.readFileSync(filePath, "utf8");
  // an empty document parses to null
  const parsed: unknown = parse(raw) ?? {};
  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid idsplit config in ${filePath}: ${details}`);
  }
  return result.data;
}

function applyFile(config: SplitterConfig, file: ConfigFile, filePath: string): void {
  const baseDir = path.dirname(filePath);
  if (file.frequencies !== undefined) {
    config.frequencies = path.resolve(baseDir, file.frequencies);
  }
  if (file.dictionary !== undefined) {
    const entries = typeof file.dictionary === "string" ? [file.dictionary] : file.dictionary;
    config.dictionary = entries.map((entry) => path.resolve(baseDir, entry));
  }
  if (file.noise_threshold !== undefined) {
    config.noiseThreshold = file.noise_threshold;
  }
  if (file.score_floor !== undefined) {
    config.scoreFloor = file.score_floor;
  }
  if (file.max_identifier_length !== undefined) {
    config.maxIdentifierLength = file.max_identifier_length;
  }
  if (file.keep_digits !== undefined) {
    config.keepDigits = file.keep_digits;
  }
  if (file.log_level !== undefined) {
    config.logLevel = file.log_level;
  }
  if (file.affixes !== undefined) {
    config.affixes = {
      prefixes: file.affixes.prefixes.map((entry) => entry.toLowerCase()),
      suffixes: file.affixes.suffixes.map((entry) => entry.toLowerCase()),
    };
  }
  config.source = filePath;
}

function applyOverrides(config: SplitterConfig, overrides: ConfigOverrides, cwd: string): void {
  if (overrides.frequencies !== undefined) {
    config.frequencies =
      overrides.frequencies === null ? null : path.resolve(cwd, overrides.frequencies);
  }
  if (overrides.dictionary !== undefined) {
    config.dictionary = overrides.dictionary.map((entry) => path.resolve(cwd, entry));
  }
  if (overrides.noiseThreshold !== undefined) {
    config.noiseThreshold = overrides.noiseThreshold;
  }
  if (overrides.scoreFloor !== undefined) {
    config.scoreFloor = overrides.scoreFloor;
  }
  if (overrides.maxIdentifierLength !== undefined) {
    config.maxIdentifierLength = overrides.maxIdentifierLength;
  }
  if (overrides.keepDigits !== undefined) {
    config.keepDigits = overrides.keepDigits;
  }
  if (overrides.logLevel !== undefined) {
    config.logLevel = overrides.logLevel;
  }
}

// ============================================================
// Loader
// ============================================================

export function loadSplitterConfig(options: LoadConfigOptions = {}): SplitterConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const config = defaultConfig();

  applyEnv(config, env, cwd);

  const filePath = resolveConfigPath(options.configPath, cwd, env);
  if (filePath) {
    applyFile(config, readConfigFile(filePath), filePath);
  }

  if (options.overrides) {
    applyOverrides(config, options.overrides, cwd);
  }
  return config;
}
