/**
 * Error types
 *
 * Two kinds of failure are exceptions here:
 *   - PluginConfigurationError - load-time faults (missing name, API
 *     version mismatch, a dynamic entry that yields no plugin). The plugin
 *     is never activated.
 *   - ContractViolationError   - a plugin or the host broke the documented
 *     protocol (wrong argument tag, script load after post-script init,
 *     reading BiF items too early). Not meant to be caught and retried.
 *
 * Hook outcomes (claimed / declined / handled) are plain values, not errors.
 */

export class HooklineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class PluginConfigurationError extends HooklineError {
  constructor(
    message: string,
    readonly pluginName?: string
  ) {
    super(pluginName ? `plugin "${pluginName}": ${message}` : message);
  }
}

export class ContractViolationError extends HooklineError {}

/** Unreadable or invalid configuration file. */
export class ConfigurationError extends HooklineError {
  constructor(
    message: string,
    readonly configPath?: string
  ) {
    super(configPath ? `${configPath}: ${message}` : message);
  }
}

export class HookArgumentTypeError extends ContractViolationError {
  constructor(
    readonly expected: string,
    readonly actual: string
  ) {
    super(`hook argument is of type "${actual}", not "${expected}"`);
  }
}
