import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { MutswitchConfigSchema, type MutswitchConfig } from './schema.js';
import { CONFIG_FILE_NAMES } from './defaults.js';

export interface CLIOptions {
  testCommand?: string;
  config?: string;
  // String version of numeric field (from commander)
  timeout?: string;
  // Direct overrides matching schema fields
  include?: string[];
  exclude?: string[];
  excludeTests?: boolean;
  families?: string[];
  output?: string;
  moduleFormat?: string;
  runtimeModule?: string;
  registryFile?: string;
  failOnSurvived?: boolean;
  dryRun?: boolean;
}

export function findConfigFile(startDir: string): string | null {
  let dir = startDir;
  while (true) {
    for (const name of CONFIG_FILE_NAMES) {
      const filePath = path.join(dir, name);
      if (fs.existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

function loadConfigFile(filePath: string): Record<string, unknown> {
  const content = fs.readFileSync(filePath, 'utf-8');
  let data: unknown;
  try {
    data = filePath.endsWith('.json') ? JSON.parse(content) : YAML.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse config file ${filePath}: ${message}`, { cause: err });
  }
  if (data === null || data === undefined) return {};
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new Error(`Config file ${filePath} must contain an object`);
  }
  return { ...data };
}

export async function loadConfig(cliOpts: CLIOptions): Promise<MutswitchConfig> {
  // Load config file
  let fileConfig: Record<string, unknown> = {};
  const configPath = cliOpts.config ?? findConfigFile(process.cwd());
  if (configPath && fs.existsSync(configPath)) {
    fileConfig = loadConfigFile(configPath);
  }

  // CLI options override file config
  const merged = {
    ...fileConfig,
    ...(cliOpts.testCommand !== undefined && { testCommand: cliOpts.testCommand }),
    ...(cliOpts.timeout !== undefined && { timeout: parseInt(cliOpts.timeout, 10) }),
    ...(cliOpts.include !== undefined && { include: cliOpts.include }),
    ...(cliOpts.exclude !== undefined && { exclude: cliOpts.exclude }),
    ...(cliOpts.excludeTests !== undefined && { excludeTests: cliOpts.excludeTests }),
    ...(cliOpts.families !== undefined && { families: cliOpts.families }),
    ...(cliOpts.output !== undefined && { output: cliOpts.output }),
    ...(cliOpts.moduleFormat !== undefined && { moduleFormat: cliOpts.moduleFormat }),
    ...(cliOpts.runtimeModule !== undefined && { runtimeModule: cliOpts.runtimeModule }),
    ...(cliOpts.registryFile !== undefined && { registryFile: cliOpts.registryFile }),
    ...(cliOpts.failOnSurvived !== undefined && { failOnSurvived: cliOpts.failOnSurvived }),
    ...(cliOpts.dryRun !== undefined && { dryRun: cliOpts.dryRun }),
  };

  return MutswitchConfigSchema.parse(merged);
}
