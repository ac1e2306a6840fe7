// Custom error classes

export class AdminError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = 'AdminError';
  }
}

/**
 * An observer filter (one that takes no arguments) was given a chain whose
 * inner computation produced a value it has no way to receive.
 */
export class IncorrectPluginArgumentError extends AdminError {
  constructor(
    message: string,
    public readonly hookName?: string,
    public readonly pluginName?: string,
  ) {
    super(message, 'INCORRECT_PLUGIN_ARGUMENT');
    this.name = 'IncorrectPluginArgumentError';
  }
}

/**
 * A view was used before `initialize()`, or initialized twice.
 */
export class ViewLifecycleError extends AdminError {
  constructor(message: string) {
    super(message, 'VIEW_LIFECYCLE');
    this.name = 'ViewLifecycleError';
  }
}

export class HookDefinitionError extends AdminError {
  constructor(message: string) {
    super(message, 'HOOK_DEFINITION_ERROR');
    this.name = 'HookDefinitionError';
  }
}

export class MethodNotAllowedError extends AdminError {
  constructor(
    message: string,
    public readonly method: string,
    public readonly allowed: readonly string[],
  ) {
    super(message, 'METHOD_NOT_ALLOWED');
    this.name = 'MethodNotAllowedError';
  }
}

export class AlreadyRegisteredError extends AdminError {
  constructor(message: string) {
    super(message, 'ALREADY_REGISTERED');
    this.name = 'AlreadyRegisteredError';
  }
}

export class ConfigError extends AdminError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}
