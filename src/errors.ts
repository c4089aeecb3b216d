/**
 * Raised for misconfiguration: an unreadable or invalid config file, or an
 * invalid command-line value. Per-artifact problems never raise.
 */
export class ConfigError extends Error {
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ConfigError';
    this.path = path;
  }
}
