import { ConfigValuesSchema, type ConfigKey, type ConfigValues } from '../contracts';
import { ValidationError } from '../errors';
import { DEFAULT_CONFIG } from './constants';

/**
 * Source of typed option values. Passed explicitly to every engine;
 * nothing in the core reads configuration from module state.
 */
export interface ConfigurationProvider {
  get<K extends ConfigKey>(key: K): ConfigValues[K];
}

/**
 * Validates a partial set of values over the defaults.
 * Throws ValidationError naming the first offending key.
 */
export function resolveConfig(overrides: Partial<ConfigValues> = {}): ConfigValues {
  const parsed = ConfigValuesSchema.safeParse({ ...DEFAULT_CONFIG, ...overrides });
  if (parsed.success) {
    return parsed.data;
  }
  const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  const key = parsed.error.issues[0]?.path[0];
  throw new ValidationError(`Invalid configuration: ${issues.join('; ')}`, {
    key: typeof key === 'string' ? key : undefined,
    issues,
  });
}

export class StaticConfigProvider implements ConfigurationProvider {
  private readonly values: ConfigValues;

  constructor(overrides: Partial<ConfigValues> = {}) {
    this.values = resolveConfig(overrides);
  }

  get<K extends ConfigKey>(key: K): ConfigValues[K] {
    return this.values[key];
  }

  toJSON(): ConfigValues {
    return { ...this.values };
  }
}

