/**
 * Error taxonomy for the scheduler.
 *
 * Only ConfigError and its subclasses stop an invocation. The others are
 * recovered at the zone, instance or payload boundary where they occur.
 */

import type { PowerOperation } from '@shared/types';

/**
 * Base exception for configuration errors.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when no project id can be resolved from the request or environment.
 */
export class ConfigurationError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when environment values or a label selector string are invalid.
 */
export class ConfigValidationError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Raised when an inbound Pub/Sub payload cannot be decoded.
 */
export class DecodeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DecodeError';
  }
}

/**
 * Raised when listing instances in one zone fails.
 */
export class ZoneDiscoveryError extends Error {
  readonly zone: string;

  constructor(zone: string, options?: ErrorOptions) {
    super(`Error listing instances in zone ${zone}: ${describeCause(options?.cause)}`, options);
    this.name = 'ZoneDiscoveryError';
    this.zone = zone;
  }
}

/**
 * Raised when a power operation on one instance fails.
 */
export class InstanceActionError extends Error {
  readonly instance: string;
  readonly zone: string;
  readonly operation: PowerOperation;

  constructor(operation: PowerOperation, zone: string, instance: string, options?: ErrorOptions) {
    super(`Failed to ${operation} instance ${instance} in zone ${zone}: ${describeCause(options?.cause)}`, options);
    this.name = 'InstanceActionError';
    this.instance = instance;
    this.zone = zone;
    this.operation = operation;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
