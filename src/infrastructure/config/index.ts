export { Config, DEFAULT_CATALOG_DIR } from './Config';
export type { ConfigOptions, CorsConfig, LogConfig } from './Config';
