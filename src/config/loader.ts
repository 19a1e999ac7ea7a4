import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import YAML from 'yaml';
import { z, ZodError } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';
import { ENV_KEYS } from './defaults.js';
import {
  LLMConfigSchema,
  SettingsSchema,
  type LLMConfig,
  type LLMConfigInput,
  type Settings,
  type SettingsInput,
} from './schema.js';

const ProjectFileSchema = z
  .object({
    llm: z.record(z.unknown()).optional(),
    settings: z.record(z.unknown()).optional(),
  })
  .nullable();

/** Raw, unvalidated sections merged from every config file found. */
export interface ProjectConfig {
  llm: Record<string, unknown>;
  settings: Record<string, unknown>;
}

export interface LoadOptions {
  cwd?: string;
  home?: string;
}

function configPaths({ cwd = process.cwd(), home }: LoadOptions): string[] {
  const paths: string[] = [];
  const userHome = home ?? process.env.HOME ?? process.env.USERPROFILE ?? '';
  // Lowest priority first
  if (userHome) {
    paths.push(join(userHome, '.citewise', 'config.yaml'));
  }
  const projectPath = join(cwd, '.citewise', 'config.yaml');
  if (!paths.includes(projectPath)) paths.push(projectPath);
  return paths;
}

function mergeSection(
  base: Record<string, unknown>,
  next: Record<string, unknown> | undefined,
): Record<string, unknown> {
  if (!next) return base;
  const merged: Record<string, unknown> = { ...base, ...next };
  const baseCache = base.cache;
  const nextCache = next.cache;
  if (isRecord(baseCache) && isRecord(nextCache)) {
    merged.cache = { ...baseCache, ...nextCache };
  }
  return merged;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load project-level config from ~/.citewise/config.yaml, then ./.citewise/config.yaml.
 * Project-local overrides user-global.
 */
export function loadProjectConfig(options: LoadOptions = {}): ProjectConfig {
  let merged: ProjectConfig = { llm: {}, settings: {} };

  for (const filePath of configPaths(options)) {
    if (!existsSync(filePath)) continue;

    let parsed: z.infer<typeof ProjectFileSchema>;
    try {
      parsed = ProjectFileSchema.parse(YAML.parse(readFileSync(filePath, 'utf-8')));
    } catch (err) {
      throw new ConfigError(`Invalid config file ${filePath}: ${describe(err)}`, { cause: err });
    }
    if (!parsed) continue;

    merged = {
      llm: mergeSection(merged.llm, parsed.llm),
      settings: mergeSection(merged.settings, parsed.settings),
    };
  }

  return merged;
}

export function parseBooleanEnv(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${value}"`);
}

function describe(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
  }
  return errorMessage(err);
}

/** Validate an LLM config, turning schema failures into ConfigError. */
export function parseLLMConfig(input: LLMConfigInput | Record<string, unknown>): LLMConfig {
  try {
    return LLMConfigSchema.parse(input);
  } catch (err) {
    throw new ConfigError(`Invalid LLM config: ${describe(err)}`, { cause: err });
  }
}

export function parseSettings(input: SettingsInput | Record<string, unknown>): Settings {
  try {
    return SettingsSchema.parse(input);
  } catch (err) {
    throw new ConfigError(`Invalid settings: ${describe(err)}`, { cause: err });
  }
}

/**
 * Resolve the effective LLM config and settings.
 * Precedence (highest first): explicit overrides, environment, config files.
 */
export function resolveConfig(
  overrides: { llm?: Record<string, unknown>; settings?: Record<string, unknown> } = {},
  options: LoadOptions & { env?: NodeJS.ProcessEnv } = {},
): { llm: LLMConfig; settings: Settings } {
  const env = options.env ?? process.env;
  const project = loadProjectConfig(options);

  const envLlm: Record<string, unknown> = {};
  const provider = env[ENV_KEYS.CITEWISE_PROVIDER];
  if (provider) envLlm.type = provider;

  const envSettings: Record<string, unknown> = {};
  const debug = parseBooleanEnv(ENV_KEYS.CITEWISE_DEBUG, env[ENV_KEYS.CITEWISE_DEBUG]);
  if (debug !== undefined) envSettings.debug = debug;
  const stream = parseBooleanEnv(ENV_KEYS.CITEWISE_STREAM, env[ENV_KEYS.CITEWISE_STREAM]);
  if (stream !== undefined) envSettings.stream = stream;

  const llm = mergeSection(mergeSection(project.llm, envLlm), overrides.llm);
  const settings = mergeSection(mergeSection(project.settings, envSettings), overrides.settings);

  return { llm: parseLLMConfig(llm), settings: parseSettings(settings) };
}
