/**
 * Error Types
 *
 * Custom error classes for mysql-advisor.
 */

/**
 * Base error class for mysql-advisor
 */
export class AdvisorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "AdvisorError";
  }
}

/**
 * A snapshot component could not be obtained. Always fatal.
 */
export class AcquisitionError extends AdvisorError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    code?: string,
  ) {
    super(message, code ?? "ACQUISITION_FAILURE", details);
    this.name = "AcquisitionError";
  }
}

/**
 * Server unreachable or the connection dropped
 */
export class ConnectionError extends AcquisitionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, "CONNECTION_ERROR");
    this.name = "ConnectionError";
  }
}

/**
 * Server rejected the supplied credentials
 */
export class AuthenticationError extends AcquisitionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, "AUTHENTICATION_ERROR");
    this.name = "AuthenticationError";
  }
}

/**
 * Connection pool misuse (not initialized, shutting down)
 */
export class PoolError extends AcquisitionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, "POOL_ERROR");
    this.name = "PoolError";
  }
}

/**
 * An administrative query failed or returned rows of an unexpected shape
 */
export class QueryError extends AcquisitionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, "QUERY_ERROR");
    this.name = "QueryError";
  }
}

/**
 * A value the derivation cannot do without is absent, or the server has not
 * done enough work to be judged.
 */
export class MissingPrerequisiteError extends AdvisorError {
  constructor(
    message: string,
    public readonly prerequisite: string,
  ) {
    super(message, "MISSING_PREREQUISITE", { prerequisite });
    this.name = "MissingPrerequisiteError";
  }
}

/**
 * Reading a host fact failed. Never escapes host fact gathering.
 */
export class HostFactError extends AdvisorError {
  constructor(
    message: string,
    public readonly fact: string,
    details?: Record<string, unknown>,
  ) {
    super(message, "UNAVAILABLE_HOST_FACT", { fact, ...details });
    this.name = "HostFactError";
  }
}

/**
 * Validation error for command-line and environment input
 */
export class ValidationError extends AdvisorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", details);
    this.name = "ValidationError";
  }
}
