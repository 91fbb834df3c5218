import path from "node:path";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { readEnv, readIntEnv } from "./env.js";
import {
  CONFIG_FILE_NAMES,
  DEFAULT_MIN_PAIR_SCORE,
  DEFAULT_OUTPUT_FORMAT,
  DEFAULT_THRESHOLD,
  OUTPUT_FORMATS,
  STATE_DIR_NAME,
  type OutputFormat
} from "./defaults.js";
import {
  ConfigFileInvalidError,
  ConfigInvalidFormatError,
  ConfigInvalidThresholdError
} from "../errors/config.errors.js";

export interface SnipcheckConfig {
  projectRoot: string;
  stateDir: string;
  matching: {
    threshold: number;
    minPairScore: number;
  };
  output: {
    format: OutputFormat;
  };
}

type ConfigFile = Record<string, unknown>;

export interface LoadConfigParams {
  projectRoot: string;
  configPath?: string | null;
  overrides?: {
    threshold?: number | null;
    minPairScore?: number | null;
    format?: string | null;
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

async function loadConfigFile(projectRoot: string, configPath?: string | null): Promise<ConfigFile> {
  const candidates = configPath
    ? [path.resolve(projectRoot, configPath)]
    : CONFIG_FILE_NAMES.map((name) => path.resolve(projectRoot, name));

  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const raw = await readFile(candidate, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigFileInvalidError(candidate, message);
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigFileInvalidError(candidate, "expected a JSON object");
    }
    return parsed;
  }

  return {};
}

function resolvePercent(key: string, fallback: number, ...candidates: unknown[]): number {
  const value = candidates.find((candidate) => candidate !== undefined && candidate !== null);
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0 || value > 100) {
    throw new ConfigInvalidThresholdError(key, value);
  }
  return value;
}

function resolveFormat(...candidates: unknown[]): OutputFormat {
  const value = candidates.find((candidate) => candidate !== undefined && candidate !== null);
  if (value === undefined) return DEFAULT_OUTPUT_FORMAT;
  const match = OUTPUT_FORMATS.find((format) => format === value);
  if (!match) {
    throw new ConfigInvalidFormatError(value);
  }
  return match;
}

export function resolveStateDir(projectRoot: string): string {
  return readEnv("SNIPCHECK_STATE_DIR") ?? path.join(projectRoot, STATE_DIR_NAME);
}

export async function loadConfig(params: LoadConfigParams): Promise<SnipcheckConfig> {
  const configFile = await loadConfigFile(params.projectRoot, params.configPath);
  const overrides = params.overrides ?? {};
  const matching: ConfigFile = isPlainObject(configFile.matching) ? configFile.matching : {};
  const output: ConfigFile = isPlainObject(configFile.output) ? configFile.output : {};

  const threshold = resolvePercent(
    "threshold",
    DEFAULT_THRESHOLD,
    overrides.threshold,
    readIntEnv("SNIPCHECK_THRESHOLD"),
    matching.threshold,
    configFile.threshold
  );
  const minPairScore = resolvePercent(
    "minPairScore",
    DEFAULT_MIN_PAIR_SCORE,
    overrides.minPairScore,
    readIntEnv("SNIPCHECK_MIN_PAIR_SCORE"),
    matching.minPairScore,
    configFile.minPairScore
  );
  const format = resolveFormat(
    overrides.format,
    readEnv("SNIPCHECK_FORMAT"),
    output.format
  );

  return {
    projectRoot: params.projectRoot,
    stateDir: resolveStateDir(params.projectRoot),
    matching: { threshold, minPairScore },
    output: { format }
  };
}
