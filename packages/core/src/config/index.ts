export { resolveConfig, StaticConfigProvider, type ConfigurationProvider } from './provider';
export { EnvConfigLoader, envVarName, type EnvConfigLoaderOptions } from './env-loader';
export * from './constants';
