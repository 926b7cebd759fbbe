import * as fs from 'fs';
import * as dotenv from 'dotenv';
import { ConfigValuesSchema, type ConfigKey, type ConfigValues } from '../contracts';
import { ValidationError } from '../errors';
import { DEFAULT_CONFIG, ENV_PREFIX } from './constants';
import { StaticConfigProvider } from './provider';

export type EnvConfigLoaderOptions = {
  /** Candidate .env files; the first one that exists is read. */
  envPaths?: string[];
  /** Variables that override the file, usually process.env. */
  env?: NodeJS.ProcessEnv;
};

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

/** `search.fuzzy_threshold` -> `TAGSHELF_SEARCH_FUZZY_THRESHOLD` */
export function envVarName(key: ConfigKey): string {
  return `${ENV_PREFIX}${key.replace(/\./g, '_').toUpperCase()}`;
}

/**
 * Builds a ConfigurationProvider from TAGSHELF_* variables.
 * Values in `env` override values found in the .env file.
 */
export class EnvConfigLoader {
  private readonly envPaths: string[];
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: EnvConfigLoaderOptions = {}) {
    this.envPaths = options.envPaths ?? [];
    this.env = options.env ?? process.env;
  }

  load(): StaticConfigProvider {
    const fileVars = this.readEnvFile();
    const raw: Record<string, unknown> = {};

    for (const key of ConfigValuesSchema.keyof().options) {
      const name = envVarName(key);
      const value = this.env[name] ?? fileVars[name];
      if (value === undefined) {
        continue;
      }
      raw[key] = parseValue(key, value);
    }

    const parsed = ConfigValuesSchema.partial().safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const key = issue?.path[0];
      throw new ValidationError(`Invalid configuration: ${issue?.message ?? 'unknown issue'}`, {
        key: typeof key === 'string' ? key : undefined,
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }

    return new StaticConfigProvider(parsed.data);
  }

  private readEnvFile(): Record<string, string> {
    for (const envPath of this.envPaths) {
      if (!envPath || !fs.existsSync(envPath)) {
        continue;
      }
      const vars = dotenv.parse(fs.readFileSync(envPath, 'utf8'));
      console.log(`[Config] Loaded .env from: ${envPath}`);
      return vars;
    }
    return {};
  }
}

function parseValue(key: ConfigKey, value: string): boolean | number {
  const text = value.trim();
  const fallback: ConfigValues[ConfigKey] = DEFAULT_CONFIG[key];

  if (typeof fallback === 'boolean') {
    const lowered = text.toLowerCase();
    if (TRUE_VALUES.has(lowered)) return true;
    if (FALSE_VALUES.has(lowered)) return false;
    throw new ValidationError(`Invalid configuration: ${envVarName(key)}="${value}" is not a boolean`, { key });
  }

  const num = text.length > 0 ? Number(text) : Number.NaN;
  if (Number.isNaN(num)) {
    throw new ValidationError(`Invalid configuration: ${envVarName(key)}="${value}" is not a number`, { key });
  }
  return num;
}
