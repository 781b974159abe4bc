/**
 * Custom Error Classes for ConfigSource
 *
 * Every failure to read or interpret a configuration value is a ConfigError,
 * which lets the settings resolver tell malformed configuration apart from
 * defects.
 */

/**
 * Base error class for all configuration errors
 */
export class ConfigError extends Error {
  public readonly key: string | undefined;

  constructor(message: string, key?: string) {
    super(message);
    this.name = 'ConfigError';
    this.key = key;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Error thrown when a value cannot be interpreted as the requested type
 */
export class ConfigValueError extends ConfigError {
  public readonly value: string | null;

  constructor(message: string, key: string, value: string | null) {
    super(message, key);
    this.name = 'ConfigValueError';
    this.value = value;
    Object.setPrototypeOf(this, ConfigValueError.prototype);
  }
}

/**
 * Error thrown when a pathname value cannot be expanded
 */
export class ConfigPathError extends ConfigError {
  public readonly value: string;

  constructor(message: string, value: string, key?: string) {
    super(message, key);
    this.name = 'ConfigPathError';
    this.value = value;
    Object.setPrototypeOf(this, ConfigPathError.prototype);
  }
}

/**
 * Error thrown when the configuration backend itself fails
 */
export class ConfigReadError extends ConfigError {
  public readonly stderr: string;

  constructor(message: string, stderr: string = '') {
    super(message);
    this.name = 'ConfigReadError';
    this.stderr = stderr;
    Object.setPrototypeOf(this, ConfigReadError.prototype);
  }
}
