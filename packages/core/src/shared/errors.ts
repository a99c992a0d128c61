export class CrosstalkError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = 'CrosstalkError';
  }
}

export class ConfigError extends CrosstalkError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class UnknownBackendError extends CrosstalkError {
  constructor(public readonly backend: string) {
    super(`Unknown backend "${backend}". Expected one of: codex, gemini`, 'UNKNOWN_BACKEND');
    this.name = 'UnknownBackendError';
  }
}
