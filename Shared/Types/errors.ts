/**
 * Base error class for the sandbox services.
 * Carries a stable machine-readable code plus optional details.
 */
export class BaseError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BaseError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Configuration-related errors (invalid env vars, unusable directories)
 */
export class ConfigurationError extends BaseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Input validation errors (bad timeout, empty code)
 */
export class ValidationError extends BaseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * The sandbox image/template does not exist on the isolation backend.
 * An environment problem, never the generated code's fault.
 */
export class SandboxNotProvisionedError extends BaseError {
  constructor(image: string, details?: Record<string, unknown>) {
    super(
      `Sandbox environment not provisioned: image "${image}" was not found. Build the sandbox image first.`,
      'SANDBOX_NOT_PROVISIONED',
      { image, ...details }
    );
    this.name = 'SandboxNotProvisionedError';
  }
}

/**
 * The isolation backend (Docker daemon) could not be contacted.
 */
export class SandboxUnavailableError extends BaseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SANDBOX_UNAVAILABLE', details);
    this.name = 'SandboxUnavailableError';
  }
}

/**
 * Database access was requested but no network for it could be attached.
 */
export class SandboxNetworkError extends BaseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SANDBOX_NETWORK_UNAVAILABLE', details);
    this.name = 'SandboxNetworkError';
  }
}

