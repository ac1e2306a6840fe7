// Public entry point

export { bootstrap, type BootstrapOptions } from './core/bootstrap';
export { Config, DEFAULT_CONFIG, type AdminConfig, type PartialAdminConfig, type PluginsConfig, type SiteConfig } from './core/Config';
export * from './hooks';
export * from './plugins';
export { AdminSite, type AdminSiteOptions, type ViewHandler } from './sites/AdminSite';
export * from './sites/types';
export * from './utils/errors';
export { encodeJson, formatDateTime } from './utils/json';
export { logger, setLogLevel, type LogLevel, type Logger } from './utils/logger';
export * from './views';
