/**
 * Configuration error - invalid hardware layout or module configuration.
 * Raised at startup; the process must not serve traffic with it.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public source: string,
    public details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Hardware initialization error - output lines could not be claimed.
 * Fatal at startup.
 */
export class HardwareInitializationError extends Error {
  constructor(
    message: string,
    public line?: number,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'HardwareInitializationError';
  }
}
