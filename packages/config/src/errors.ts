export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR';
  readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.key = key;
  }
}
