// Interfaces to the hosting web framework

export interface AdminUser {
  readonly username: string;
  readonly isSuperuser: boolean;
  hasPerm(perm: string): boolean;
}

/**
 * Per-session key/value storage. Values are strings; callers serialize.
 */
export interface SessionStore {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
  has(key: string): boolean;
  delete(key: string): void;
}

export interface AdminRequest {
  readonly method: string;
  readonly path: string;
  readonly query: Readonly<Record<string, string>>;
  readonly headers: Readonly<Record<string, string | undefined>>;
  readonly user: AdminUser;
  readonly session: SessionStore;
}

/** Positional and named arguments captured by the route that matched */
export interface RouteMatch {
  readonly args: readonly string[];
  readonly kwargs: Readonly<Record<string, string>>;
}

export const EMPTY_ROUTE: RouteMatch = Object.freeze({ args: Object.freeze([]), kwargs: Object.freeze({}) });

export interface UrlResolver {
  reverse(name: string, args: readonly string[]): string;
}

export interface TemplateRenderer {
  render(templates: readonly string[], context: Readonly<Record<string, unknown>>, request: AdminRequest): string;
}

export type MessageLevel = 'debug' | 'info' | 'success' | 'warning' | 'error';

export interface MessageSink {
  add(request: AdminRequest, level: MessageLevel, message: string): void;
}

export interface ModelDescriptor {
  readonly appLabel: string;
  /** Lower-case model identifier used in URL names and permissions */
  readonly modelName: string;
  readonly verboseNamePlural: string;
}

export interface ModelRepository<T> {
  findById(id: string): T | undefined;
}

export interface ModelAdminOptions<T = unknown> {
  icon?: string;
  repository?: ModelRepository<T>;
  ordering?: readonly string[];
}

export interface AdminResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}
