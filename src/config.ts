/**
 * Configuration
 *
 * Resolution order, later wins:
 *   1. built-in defaults
 *   2. `.api-surface.json` / `.api-surface.yaml` in the working directory
 *   3. API_SURFACE_STORE / API_SURFACE_MAX_DEPTH environment variables
 *   4. explicit overrides (CLI flags)
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './core/errors';
import { ReportFormat } from './core/types';
import { parseDocumentText } from './formats';

export interface InspectorConfig {
  /** Directory of the file graph store */
  storeDir: string;

  /** Snapshot used when a command names none */
  defaultSnapshot: string;

  /** Schema nesting bound during ingestion */
  maxDepth: number;

  /** Methods the dependency mapper treats as resource creation */
  creationVerbs: string[];

  format: ReportFormat;
}

export const CONFIG_FILES = ['.api-surface.json', '.api-surface.yaml', '.api-surface.yml'];

export const DEFAULT_CONFIG: InspectorConfig = {
  storeDir: '.api-surface',
  defaultSnapshot: 'default',
  maxDepth: 10,
  creationVerbs: ['POST'],
  format: 'console',
};

const maxDepthSchema = z.number().int().min(1).max(64);

const configFileSchema = z
  .object({
    storeDir: z.string().min(1),
    defaultSnapshot: z.string().min(1),
    maxDepth: maxDepthSchema,
    creationVerbs: z.array(z.string().min(1)).min(1),
    format: z.enum(['console', 'json', 'markdown']),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<InspectorConfig>;
}

/**
 * Read and validate the first config file found in `cwd`, if any.
 */
export function readConfigFile(cwd: string): { file: string; config: ConfigFile } | null {
  for (const name of CONFIG_FILES) {
    const file = path.join(cwd, name);
    if (!fs.existsSync(file)) continue;

    let raw: unknown;
    try {
      raw = parseDocumentText(fs.readFileSync(file, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Cannot read ${name}: ${errorMessage(error)}`, { file });
    }

    const parsed = configFileSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new ConfigurationError(`Invalid ${name}: ${issues.join('; ')}`, { file });
    }
    return { file, config: parsed.data };
  }
  return null;
}

function fromEnv(env: NodeJS.ProcessEnv): Partial<InspectorConfig> {
  const config: Partial<InspectorConfig> = {};

  if (env.API_SURFACE_STORE) config.storeDir = env.API_SURFACE_STORE;

  if (env.API_SURFACE_MAX_DEPTH) {
    const depth = maxDepthSchema.safeParse(Number(env.API_SURFACE_MAX_DEPTH));
    if (!depth.success) {
      throw new ConfigurationError(
        `API_SURFACE_MAX_DEPTH must be an integer between 1 and 64, got "${env.API_SURFACE_MAX_DEPTH}"`
      );
    }
    config.maxDepth = depth.data;
  }

  return config;
}

// Unset keys must not shadow earlier layers
function definedEntries(source: Partial<InspectorConfig>): Partial<InspectorConfig> {
  const result: Partial<InspectorConfig> = {};
  if (source.storeDir !== undefined) result.storeDir = source.storeDir;
  if (source.defaultSnapshot !== undefined) result.defaultSnapshot = source.defaultSnapshot;
  if (source.maxDepth !== undefined) result.maxDepth = source.maxDepth;
  if (source.creationVerbs !== undefined) result.creationVerbs = source.creationVerbs;
  if (source.format !== undefined) result.format = source.format;
  return result;
}

export function loadConfig(options: LoadConfigOptions = {}): InspectorConfig {
  const cwd = options.cwd ?? process.cwd();
  const file = readConfigFile(cwd);

  const config: InspectorConfig = {
    ...DEFAULT_CONFIG,
    ...(file ? definedEntries(file.config) : {}),
    ...fromEnv(options.env ?? process.env),
    ...definedEntries(options.overrides ?? {}),
  };

  return {
    ...config,
    storeDir: path.resolve(cwd, config.storeDir),
    creationVerbs: config.creationVerbs.map((v) => v.toUpperCase()),
  };
}
