import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { Config, ConfigSchema, ConfigError, resolveFrom } from '@kiln/shared';

export const CONFIG_FILENAME = 'kiln.yaml';

export interface ConfigOptions {
  configPath?: string; // CLI override
  overrides?: Record<string, unknown>; // CLI flags, merged last
  cwd?: string; // Directory the project root is searched from
}

/**
 * Absolute locations derived from `paths` in the configuration.
 */
export interface ResolvedPaths {
  root: string;
  descriptor: string;
  tests: string;
  target: string;
  dist: string;
  state: string;
  cache: string;
  metrics: string;
  logs: string;
}

export interface LoadedConfig {
  config: Config;
  configPath: string | undefined;
  paths: ResolvedPaths;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walks up from `start` looking for kiln.yaml, then for `descriptor`.
 * Falls back to `start` when neither is found.
 */
export function findProjectRoot(start: string, descriptor = 'Cargo.toml'): string {
  for (const marker of [CONFIG_FILENAME, descriptor]) {
    let dir = path.resolve(start);
    for (;;) {
      if (fs.existsSync(path.join(dir, marker))) {
        return dir;
      }
      const parent = path.dirname(dir);
      if (parent === dir) break;
      dir = parent;
    }
  }
  return path.resolve(start);
}

export function resolvePaths(root: string, config: Config): ResolvedPaths {
  const state = resolveFrom(root, config.paths.state);
  return {
    root,
    descriptor: resolveFrom(root, config.project.descriptor),
    tests: resolveFrom(root, config.project.testsDir),
    target: resolveFrom(root, config.paths.target),
    dist: resolveFrom(root, config.paths.dist),
    state,
    cache: path.join(state, 'cache'),
    metrics: path.join(state, 'metrics.json'),
    logs: resolveFrom(root, config.paths.logs),
  };
}

export class ConfigLoader {
  static loadYaml(filePath: string): Record<string, unknown> {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
    // An empty file loads as undefined.
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Configuration file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(
    target: Record<string, unknown>,
    source: Record<string, unknown>,
  ): Record<string, unknown> {
    const output = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static parse(raw: Record<string, unknown>, source = 'configuration'): Config {
    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed (${source}):\n${issues}`, {
        details: { issues: result.error.issues.map((i) => i.path.join('.')) },
      });
    }
    return result.data;
  }

  static load(options: ConfigOptions = {}): LoadedConfig {
    const cwd = path.resolve(options.cwd ?? process.cwd());

    // An explicit --config file fixes the project root to its directory.
    let configPath: string | undefined;
    let root: string;
    if (options.configPath) {
      configPath = path.resolve(cwd, options.configPath);
      if (!fs.existsSync(configPath)) {
        throw new ConfigError(`Config file not found: ${configPath}`);
      }
      root = path.dirname(configPath);
    } else {
      root = findProjectRoot(cwd);
      const candidate = path.join(root, CONFIG_FILENAME);
      configPath = fs.existsSync(candidate) ? candidate : undefined;
    }

    const fileConfig = configPath ? this.loadYaml(configPath) : {};
    const merged = this.mergeConfigs(fileConfig, options.overrides ?? {});
    const config = this.parse(merged, configPath ?? 'defaults');

    return { config, configPath, paths: resolvePaths(root, config) };
  }
}
