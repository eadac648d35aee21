import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { join, dirname } from 'path';
import { z } from 'zod';
import { ValidationError, createLogger, errorMessage } from '@graphrun/shared';

const logger = createLogger({ name: 'cli-config' });

export const CLIConfigSchema = z.object({
  serviceUrl: z.string().url(),
  defaultFormat: z.enum(['json', 'table']),
});

export type CLIConfig = z.infer<typeof CLIConfigSchema>;
export type CLIConfigKey = keyof CLIConfig;

export const DEFAULT_CONFIG: CLIConfig = {
  serviceUrl: 'http://localhost:8000',
  defaultFormat: 'table',
};

export const CONFIG_KEYS: readonly CLIConfigKey[] = ['serviceUrl', 'defaultFormat'];

export function isConfigKey(key: string): key is CLIConfigKey {
  return CONFIG_KEYS.some((candidate) => candidate === key);
}

export function defaultConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.GRAPHRUN_CONFIG_DIR || join(homedir(), '.graphrun');
}

export class ConfigManager {
  private configPath: string;
  private config: CLIConfig;

  constructor(configDir: string = defaultConfigDir()) {
    this.configPath = join(configDir, 'config.json');
    this.config = this.load();
  }

  private load(): CLIConfig {
    if (!existsSync(this.configPath)) {
      return { ...DEFAULT_CONFIG };
    }

    try {
      const loaded: unknown = JSON.parse(readFileSync(this.configPath, 'utf-8'));
      const parsed = CLIConfigSchema.partial().safeParse(loaded);
      if (parsed.success) {
        return { ...DEFAULT_CONFIG, ...parsed.data };
      }
      logger.warn({ path: this.configPath, issues: parsed.error.issues }, 'Invalid config, using defaults');
    } catch (error) {
      logger.warn({ path: this.configPath, error: errorMessage(error) }, 'Failed to load config, using defaults');
    }

    return { ...DEFAULT_CONFIG };
  }

  private save(config: CLIConfig): void {
    const dir = dirname(this.configPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(this.configPath, JSON.stringify(config, null, 2));
  }

  get(): CLIConfig {
    return { ...this.config };
  }

  /** Validate and persist one value. */
  set(key: CLIConfigKey, value: string): CLIConfig {
    const parsed = CLIConfigSchema.safeParse({ ...this.config, [key]: value });
    if (!parsed.success) {
      throw new ValidationError(`Invalid value for ${key}: ${value}`, {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }

    this.config = parsed.data;
    this.save(this.config);
    return this.get();
  }

  reset(): void {
    this.config = { ...DEFAULT_CONFIG };
    this.save(this.config);
  }

  getPath(): string {
    return this.configPath;
  }
}

let sharedManager: ConfigManager | undefined;

export function getConfigManager(): ConfigManager {
  sharedManager ??= new ConfigManager();
  return sharedManager;
}
