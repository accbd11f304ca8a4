import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import {
  ConfigError,
  DumpConfigSchema,
  type DeepPartial,
  type DumpConfig,
  type DumpConfigInput,
} from '@repodump/shared';

export type ConfigOverrides = DeepPartial<DumpConfigInput>;

export interface ConfigOptions {
  /** Explicit `--config` file; must exist. */
  configPath?: string;
  /** CLI flags, already shaped like the config. */
  flags?: ConfigOverrides;
  /** Scan root, where `.repodump.yaml` is looked up. */
  cwd?: string;
  /** Defaults to the user's home directory. */
  homeDir?: string;
}

type ConfigRecord = Record<string, unknown>;

export const USER_CONFIG_FILE = path.join('.repodump', 'config.yaml');
export const REPO_CONFIG_FILE = '.repodump.yaml';

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    let parsed: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      parsed = yaml.load(content);
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, { cause: error });
      }
      throw error;
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  /** Objects merge key by key; arrays and primitives replace. */
  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output: ConfigRecord = { ...target };

    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      if (sourceValue === undefined) {
        continue;
      }

      const targetValue = output[key];
      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        output[key] = sourceValue;
      }
    }
    return output;
  }

  /**
   * Resolves the effective config, lowest precedence first:
   * defaults < ~/.repodump/config.yaml < <root>/.repodump.yaml < --config < flags.
   * @throws ConfigError for unreadable files, bad YAML or schema violations
   */
  static load(options: ConfigOptions = {}): DumpConfig {
    const cwd = options.cwd || process.cwd();
    const homeDir = options.homeDir || os.homedir();

    const userConfig = this.loadYaml(path.join(homeDir, USER_CONFIG_FILE));
    const repoConfig = this.loadYaml(path.join(cwd, REPO_CONFIG_FILE));

    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, options.flags ?? {});

    const result = DumpConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`, {
        details: { issues: result.error.issues.length },
      });
    }
    return result.data;
  }
}

function isPlainObject(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
