// Admin bootstrap - configuration, logging and the site

import { AdminSite, type AdminSiteOptions } from '@/sites/AdminSite';
import { logger, setLogLevel } from '@/utils/logger';
import { Config, type PartialAdminConfig } from './Config';

export interface BootstrapOptions extends Omit<AdminSiteOptions, 'config'> {
  /** Config file path or inline config; see {@link Config} */
  config?: string | PartialAdminConfig;
}

/**
 * Load the configuration, apply its log level and create the site.
 * Models and plugins are registered on the returned site by the caller.
 */
export function bootstrap(options: BootstrapOptions = {}): AdminSite {
  const { config: source, ...siteOptions } = options;
  const config = new Config(source);
  setLogLevel(config.getLogLevel());

  const site = new AdminSite({ ...siteOptions, config });
  logger.info(`[Bootstrap] Admin site "${site.name}" ready (config: ${config.source ?? 'inline/defaults'})`);
  return site;
}
