// Configuration management

import { ConfigError } from '@/utils/errors';
import { isLogLevel, type LogLevel } from '@/utils/logger';
import { existsSync, readFileSync } from 'node:fs';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { extname, resolve } from 'node:path';

export interface SiteConfig {
  /** URL namespace prepended when reversing admin URLs */
  name: string;
  title: string;
  staticPrefix: string;
}

export interface PluginsConfig {
  /** Plugin names that are never instantiated */
  disabled: string[];
}

export interface AdminConfig {
  logLevel: LogLevel;
  /** Disables the per-session navigation menu cache */
  debug: boolean;
  site: SiteConfig;
  plugins: PluginsConfig;
  defaultModelIcon: string | null;
}

export interface PartialAdminConfig {
  logLevel?: LogLevel;
  debug?: boolean;
  site?: Partial<SiteConfig>;
  plugins?: Partial<PluginsConfig>;
  defaultModelIcon?: string | null;
}

export const DEFAULT_CONFIG: Readonly<AdminConfig> = {
  logLevel: 'info',
  debug: false,
  site: {
    name: 'admin',
    title: 'Admin',
    staticPrefix: '/static/',
  },
  plugins: {
    disabled: [],
  },
  defaultModelIcon: null,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class Config {
  private config: AdminConfig;
  readonly source: string | null;

  /**
   * @param source - path to a `.jsonc` file, or an already parsed object. Without
   * one, `CONFIG_PATH` and then `./config.jsonc` are tried before falling back
   * to the defaults.
   */
  constructor(source?: string | PartialAdminConfig) {
    this.source = typeof source === 'object' ? null : this.resolveConfigPath(source);
    this.config = this.load(typeof source === 'object' ? source : undefined);
  }

  private load(inline?: PartialAdminConfig): AdminConfig {
    try {
      if (inline) {
        return this.normalize(inline);
      }
      return this.normalize(this.source ? this.loadConfig(this.source) : {});
    } catch (error) {
      if (error instanceof ConfigError) {
        throw error;
      }
      if (error instanceof Error) {
        throw new ConfigError(`Failed to load config: ${error.message}`);
      }
      throw new ConfigError('Failed to load config: Unknown error');
    }
  }

  private resolveConfigPath(configPath?: string): string | null {
    // Priority: 1. constructor argument, 2. CONFIG_PATH env var, 3. default location
    const explicit = configPath ?? process.env.CONFIG_PATH;
    if (explicit) {
      const resolved = resolve(explicit);
      if (!existsSync(resolved)) {
        throw new ConfigError(`Config file not found: ${explicit} (resolved: ${resolved})`);
      }
      const ext = extname(resolved).toLowerCase();
      if (ext !== '.jsonc' && ext !== '.json') {
        throw new ConfigError(`Config file must have .jsonc or .json extension. Found: ${ext} at ${resolved}`);
      }
      return resolved;
    }

    const defaultPath = resolve(process.cwd(), 'config.jsonc');
    return existsSync(defaultPath) ? defaultPath : null;
  }

  private loadConfig(configPath: string): unknown {
    const content = readFileSync(configPath, 'utf-8');

    const parseErrors: ParseError[] = [];
    const parsed: unknown = parseJsonc(content, parseErrors, { allowTrailingComma: true });

    if (parseErrors.length > 0) {
      const messages = parseErrors.map((err) => `${printParseErrorCode(err.error)} at offset ${err.offset}`);
      throw new ConfigError(`JSONC parse errors in ${configPath}: ${messages.join(', ')}`);
    }

    return parsed;
  }

  private normalize(raw: unknown): AdminConfig {
    if (!isRecord(raw)) {
      throw new ConfigError('Config must be a JSON object');
    }

    const logLevel = raw.logLevel ?? DEFAULT_CONFIG.logLevel;
    if (!isLogLevel(logLevel)) {
      throw new ConfigError(`logLevel must be one of debug, info, warn, error. Found: ${String(logLevel)}`);
    }

    const debug = raw.debug ?? DEFAULT_CONFIG.debug;
    if (typeof debug !== 'boolean') {
      throw new ConfigError('debug must be a boolean');
    }

    const site = raw.site ?? {};
    if (!isRecord(site)) {
      throw new ConfigError('site must be an object');
    }
    const siteConfig: SiteConfig = {
      name: this.readString(site, 'name', DEFAULT_CONFIG.site.name, 'site.name'),
      title: this.readString(site, 'title', DEFAULT_CONFIG.site.title, 'site.title'),
      staticPrefix: this.readString(site, 'staticPrefix', DEFAULT_CONFIG.site.staticPrefix, 'site.staticPrefix'),
    };
    if (!siteConfig.name) {
      throw new ConfigError('site.name must not be empty');
    }

    const plugins = raw.plugins ?? {};
    if (!isRecord(plugins)) {
      throw new ConfigError('plugins must be an object');
    }
    const disabled = plugins.disabled ?? [];
    if (!Array.isArray(disabled) || !disabled.every((name): name is string => typeof name === 'string')) {
      throw new ConfigError('plugins.disabled must be an array of plugin names');
    }

    const defaultModelIcon = raw.defaultModelIcon ?? DEFAULT_CONFIG.defaultModelIcon;
    if (defaultModelIcon !== null && typeof defaultModelIcon !== 'string') {
      throw new ConfigError('defaultModelIcon must be a string or null');
    }

    return {
      logLevel,
      debug,
      site: siteConfig,
      plugins: { disabled: [...disabled] },
      defaultModelIcon,
    };
  }

  private readString(section: Record<string, unknown>, key: string, fallback: string, label: string): string {
    const value = section[key] ?? fallback;
    if (typeof value !== 'string') {
      throw new ConfigError(`${label} must be a string`);
    }
    return value;
  }

  getConfig(): AdminConfig {
    return this.config;
  }

  getLogLevel(): LogLevel {
    return this.config.logLevel;
  }

  isDebug(): boolean {
    return this.config.debug;
  }

  getSiteConfig(): SiteConfig {
    return this.config.site;
  }

  getPluginsConfig(): PluginsConfig {
    return this.config.plugins;
  }

  isPluginDisabled(name: string): boolean {
    return this.config.plugins.disabled.includes(name);
  }

  getDefaultModelIcon(): string | null {
    return this.config.defaultModelIcon;
  }
}
