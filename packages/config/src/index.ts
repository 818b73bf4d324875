import fs from "node:fs";
import path from "node:path";
import {
  NEWLINE_STYLES,
  TOP_LEVEL_KINDS,
  isTopLevelKind,
  type MaxLeafing,
  type NewlineStyle,
} from "@helena/syntax";

export interface HelenaConfig {
  name: string;
  /** Source file built when no other is named. */
  src: string;
  newline: NewlineStyle;
  maxLeafing: Partial<MaxLeafing>;
}

export interface ResolvedHelenaConfig extends HelenaConfig {
  rootDir: string;
  configPath: string;
  srcPath: string;
}

export interface LoadConfigOptions {
  cwd?: string;
  path?: string;
}

export const DEFAULT_CONFIG_NAME = "helena.json";

/**
 * Reads `helena.json` from `cwd`, or the file at `path` resolved against it,
 * and resolves the source file next to it.
 */
export function loadConfig({
  cwd = process.cwd(),
  path: explicitPath,
}: LoadConfigOptions = {}): ResolvedHelenaConfig {
  const configPath = path.resolve(cwd, explicitPath || DEFAULT_CONFIG_NAME);
  const config = validateConfig(readConfigFile(configPath), configPath);
  const rootDir = path.dirname(configPath);

  return {
    ...config,
    rootDir,
    configPath,
    srcPath: path.resolve(rootDir, config.src),
  };
}

function readConfigFile(configPath: string): unknown {
  if (!fs.existsSync(configPath)) {
    throw new Error(`No ${DEFAULT_CONFIG_NAME} found at ${configPath}`);
  }

  const text = fs.readFileSync(configPath, "utf8");
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON in ${configPath}: ${reason}`);
  }
}

function validateConfig(config: unknown, sourcePath: string): HelenaConfig {
  if (!isRecord(config)) {
    throw new Error(`Config at ${sourcePath} must be an object`);
  }

  const name = expectString(config, "name", sourcePath);
  const src = expectString(config, "src", sourcePath);
  const newline = expectNewlineStyle(config, "newline", sourcePath);
  const maxLeafing = expectMaxLeafing(config, "maxLeafing", sourcePath);

  return { name, src, newline, maxLeafing };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectString(
  config: Record<string, unknown>,
  key: string,
  sourcePath: string
): string {
  const value = config[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new Error(
      `Config field "${key}" in ${sourcePath} must be a non-empty string`
    );
  }
  return value;
}

function expectNewlineStyle(
  config: Record<string, unknown>,
  key: string,
  sourcePath: string
): NewlineStyle {
  const value = config[key];
  if (value === undefined) {
    return "platform";
  }
  const style = NEWLINE_STYLES.find((candidate) => candidate === value);
  if (style === undefined) {
    throw new Error(
      `Config field "${key}" in ${sourcePath} must be one of ${NEWLINE_STYLES.join(
        ", "
      )}`
    );
  }
  return style;
}

function expectMaxLeafing(
  config: Record<string, unknown>,
  key: string,
  sourcePath: string
): Partial<MaxLeafing> {
  const value = config[key];
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new Error(
      `Config field "${key}" in ${sourcePath} must map declaration kinds to counts`
    );
  }

  const caps: Partial<MaxLeafing> = {};
  for (const [kind, cap] of Object.entries(value)) {
    if (!isTopLevelKind(kind)) {
      throw new Error(
        `Config field "${key}" in ${sourcePath} has unknown kind "${kind}" (expected ${TOP_LEVEL_KINDS.join(
          ", "
        )})`
      );
    }
    if (typeof cap !== "number" || !Number.isInteger(cap) || cap < 0) {
      throw new Error(
        `Config field "${key}.${kind}" in ${sourcePath} must be a non-negative integer`
      );
    }
    caps[kind] = cap;
  }
  return caps;
}
