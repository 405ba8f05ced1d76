import { readFile } from 'fs/promises';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { RULE_KINDS, type PathContext, type Rule, type RuleKind } from '../types.js';
import type { Distro } from './distro.js';
import { distroIdentifiers } from './distro.js';
import { errorMessage, isNotFound } from './fs.js';

export const CONFIG_VERSION = 1;

export const BUNDLED_CONFIG_PATH = fileURLToPath(new URL('../../config/default.json', import.meta.url));

export interface Config {
  version: number;
  rules: Rule[];
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

let cachedConfig: Config | null = null;

export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * User config location: `$XDG_CONFIG_HOME/dustpan/config.json`, falling
 * back to `~/.config/dustpan/config.json`.
 */
export function userConfigPath(context: PathContext): string {
  const base = context.env?.XDG_CONFIG_HOME || join(context.home, '.config');
  return join(base, 'dustpan', 'config.json');
}

/**
 * Loads rules from `configPath` if given, else the user config if present,
 * else the bundled defaults.
 */
export async function loadConfig(configPath: string | undefined, context: PathContext): Promise<Config> {
  if (cachedConfig && !configPath) {
    return cachedConfig;
  }

  if (configPath) {
    return readConfigFile(configPath);
  }

  const userPath = userConfigPath(context);
  const userContent = await readOptional(userPath);
  cachedConfig = userContent === null
    ? await readConfigFile(BUNDLED_CONFIG_PATH)
    : parseConfig(userContent, userPath);
  return cachedConfig;
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return null;
    throw new ConfigError(`Failed to read config file ${path}: ${errorMessage(error)}`);
  }
}

async function readConfigFile(path: string): Promise<Config> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to read config file ${path}: ${errorMessage(error)}`);
  }
  return parseConfig(content, path);
}

export function parseConfig(content: string, source: string): Config {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file ${source}: ${errorMessage(error)}`);
  }

  if (!isRecord(data)) {
    throw new ConfigError(`Config file ${source} must contain a JSON object`);
  }
  if (data.version !== CONFIG_VERSION) {
    throw new ConfigError(`Unsupported config version ${String(data.version)} in ${source}`);
  }

  const rawRules = data.rules ?? [];
  if (!Array.isArray(rawRules)) {
    throw new ConfigError(`"rules" must be an array in ${source}`);
  }

  const rules = rawRules.map((raw, index) => parseRule(raw, `${source}: rules[${index}]`));
  const seen = new Set<string>();
  for (const rule of rules) {
    const key = rule.id.toLowerCase();
    if (seen.has(key)) {
      throw new ConfigError(`Duplicate rule id "${rule.id}" in ${source}`);
    }
    seen.add(key);
  }

  return { version: CONFIG_VERSION, rules };
}

function parseRule(raw: unknown, where: string): Rule {
  if (!isRecord(raw)) {
    throw new ConfigError(`${where} must be an object`);
  }

  const id = requireString(raw, 'id', where);
  const label = requireString(raw, 'label', where);
  const kind = parseKind(raw.kind, where);
  const description = optionalString(raw, 'description', where);

  return {
    id,
    label,
    description,
    kind,
    paths: stringList(raw, 'paths', where),
    requiresSudo: flag(raw, 'requiresSudo', where),
    enabledByDefault: flag(raw, 'enabledByDefault', where),
    distros: stringList(raw, 'distros', where),
    excludeGlobs: stringList(raw, 'excludeGlobs', where),
    olderThanDays: optionalDays(raw, 'olderThanDays', where),
  };
}

function parseKind(value: unknown, where: string): RuleKind {
  if (value === undefined) return 'paths';
  const kind = RULE_KINDS.find((k) => k === value);
  if (kind === undefined) {
    throw new ConfigError(`${where}: unknown rule kind ${JSON.stringify(value)}`);
  }
  return kind;
}

function requireString(raw: Record<string, unknown>, key: string, where: string): string {
  const value = raw[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`${where}: "${key}" must be a non-empty string`);
  }
  return value;
}

function optionalString(raw: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`${where}: "${key}" must be a string`);
  }
  return value;
}

function optionalDays(raw: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${where}: "${key}" must be a non-negative number`);
  }
  return value;
}

function stringList(raw: Record<string, unknown>, key: string, where: string): string[] {
  const value = raw[key];
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`${where}: "${key}" must be an array of strings`);
  }
  return value;
}

function flag(raw: Record<string, unknown>, key: string, where: string): boolean {
  const value = raw[key];
  if (value === undefined) return false;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${where}: "${key}" must be a boolean`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Rules that apply to `distro`: those without a distro list, or whose list
 * shares an identifier with it.
 */
export function availableRules(config: Config, distro: Distro): Rule[] {
  const ids = distroIdentifiers(distro);
  return config.rules.filter((rule) => {
    if (rule.distros.length === 0) return true;
    return rule.distros.some((d) => ids.includes(d.toLowerCase()));
  });
}
