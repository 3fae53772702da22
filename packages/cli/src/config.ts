import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import yaml from "js-yaml";
import { WaymarkError, isConfigFile, validateConfigFileData, type WaymarkConfigFile } from "@waymark/schemas";

export interface WaymarkConfig {
  mapDir: string;
  journalPath: string;
  mapDebug: boolean;
  mapWidth: number;
  mapHeight: number;
  nearbyRadius: number;
  /** The YAML file that was read, if any. */
  configPath: string | null;
}

export type ConfigOverrides = Partial<Omit<WaymarkConfig, "configPath">>;

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  homeDir?: string;
  /** Command-line values; they win over env and file. */
  overrides?: ConfigOverrides;
}

export interface ServerAddress {
  host: string;
  port: number;
}

export const DEFAULT_MAP_WIDTH = 30;
export const DEFAULT_MAP_HEIGHT = 15;
export const DEFAULT_NEARBY_RADIUS = 5;
export const CONFIG_FILE_NAME = "waymark.yaml";

export function parsePort(value: string, label = "port"): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid ${label}: "${value}" (must be 1–65535)`);
  }
  return port;
}

export function parsePositiveInt(value: string, label: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n) || n < 1) {
    throw new Error(`Invalid ${label}: "${value}" (must be a positive integer)`);
  }
  return n;
}

export function parseBoolean(value: string, label: string): boolean {
  switch (value.trim().toLowerCase()) {
    case "1":
    case "true":
      return true;
    case "":
    case "0":
    case "false":
      return false;
    default:
      throw new Error(`Invalid ${label}: "${value}" (must be 1, 0, true or false)`);
  }
}

/** "host:port" → parts. The port is taken after the last colon. */
export function parseServer(value: string): ServerAddress {
  const idx = value.lastIndexOf(":");
  const host = idx === -1 ? "" : value.slice(0, idx).trim();
  if (!host) throw new Error(`Invalid server: "${value}" (expected host:port)`);
  return { host, port: parsePort(value.slice(idx + 1), "server port") };
}

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
}

async function readConfigFile(path: string, required: boolean): Promise<WaymarkConfigFile | null> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    if (!required && errorCode(err) === "ENOENT") return null;
    const message = err instanceof Error ? err.message : String(err);
    throw new WaymarkError("INVALID_CONFIG", `Cannot read config file ${path}: ${message}`, { path }, { cause: err });
  }

  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new WaymarkError("INVALID_CONFIG", `Cannot parse config file ${path}: ${message}`, { path }, { cause: err });
  }
  // An empty document loads as undefined
  if (data === undefined || data === null) return {};

  if (!isConfigFile(data)) {
    const { errors } = validateConfigFileData(data);
    throw new WaymarkError("INVALID_CONFIG", `Invalid config file ${path}: ${errors.join(", ")}`, { path, errors });
  }
  return data;
}

/**
 * Resolves settings: command line over WAYMARK_* environment over the YAML
 * file over defaults. The file is $WAYMARK_CONFIG, else ./waymark.yaml if it
 * exists.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<WaymarkConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const home = options.homeDir ?? homedir();
  const overrides = options.overrides ?? {};

  const explicitPath = env.WAYMARK_CONFIG;
  const configPath = resolve(cwd, explicitPath ?? CONFIG_FILE_NAME);
  const file = await readConfigFile(configPath, explicitPath !== undefined);
  const fromFile: WaymarkConfigFile = file ?? {};

  const envInt = (name: string): number | undefined => {
    const raw = env[name];
    return raw === undefined ? undefined : parsePositiveInt(raw, name);
  };

  const mapDir = overrides.mapDir
    ?? (env.WAYMARK_MAP_DIR ? resolve(cwd, env.WAYMARK_MAP_DIR) : undefined)
    ?? (fromFile.map_dir ? resolve(dirname(configPath), fromFile.map_dir) : undefined)
    ?? join(home, ".config", "waymark", "maps");

  const journalPath = overrides.journalPath
    ?? (env.WAYMARK_JOURNAL_PATH ? resolve(cwd, env.WAYMARK_JOURNAL_PATH) : undefined)
    ?? (fromFile.journal_path ? resolve(dirname(configPath), fromFile.journal_path) : undefined)
    ?? join(dirname(mapDir), "journal", "events.jsonl");

  const rawDebug = env.WAYMARK_MAP_DEBUG;
  return {
    mapDir,
    journalPath,
    mapDebug: overrides.mapDebug
      ?? (rawDebug === undefined ? undefined : parseBoolean(rawDebug, "WAYMARK_MAP_DEBUG"))
      ?? fromFile.map_debug
      ?? false,
    mapWidth: overrides.mapWidth ?? envInt("WAYMARK_MAP_WIDTH") ?? fromFile.map_width ?? DEFAULT_MAP_WIDTH,
    mapHeight: overrides.mapHeight ?? envInt("WAYMARK_MAP_HEIGHT") ?? fromFile.map_height ?? DEFAULT_MAP_HEIGHT,
    nearbyRadius: overrides.nearbyRadius ?? envInt("WAYMARK_NEARBY_RADIUS") ?? fromFile.nearby_radius ?? DEFAULT_NEARBY_RADIUS,
    configPath: file === null ? null : configPath,
  };
}
