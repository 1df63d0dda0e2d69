export class ChromePressError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ChromePressError';
  }
}

export class ChromeNotFoundError extends ChromePressError {
  constructor(message = 'No supported browser found (Chrome/Chromium/Edge/Brave). Install one or provide executablePath.', options?: ErrorOptions) {
    super(message, options);
    this.name = 'ChromeNotFoundError';
  }
}

export class LaunchFailedError extends ChromePressError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LaunchFailedError';
  }
}

export class StartupTimeoutError extends ChromePressError {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StartupTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ConnectionError extends ChromePressError {
  public readonly endpoint: string;

  constructor(endpoint: string, message: string, options?: ErrorOptions) {
    super(`Failed to connect to ${endpoint}: ${message}`, options);
    this.name = 'ConnectionError';
    this.endpoint = endpoint;
  }
}

export class NavigationError extends ChromePressError {
  constructor(
    message: string,
    public readonly target: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'NavigationError';
  }
}

/** A readiness condition was not satisfied before its deadline. */
export class TimeoutError extends ChromePressError {
  public readonly condition: string;
  public readonly timeoutMs: number;

  constructor(message: string, condition: string, timeoutMs: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TimeoutError';
    this.condition = condition;
    this.timeoutMs = timeoutMs;
  }
}

export class InterruptedError extends ChromePressError {
  constructor(message = 'Operation was interrupted', options?: ErrorOptions) {
    super(message, options);
    this.name = 'InterruptedError';
  }
}

export class RenderError extends ChromePressError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RenderError';
  }
}

export class IllegalStateError extends ChromePressError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'IllegalStateError';
  }
}

export class InvalidConfigError extends ChromePressError {
  public readonly field: string;
  public readonly issues: string[];

  constructor(field: string, issues: string[], options?: ErrorOptions) {
    super(`Invalid ${field}: ${issues.join('; ')}`, options);
    this.name = 'InvalidConfigError';
    this.field = field;
    this.issues = issues;
  }
}
