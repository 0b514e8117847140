/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { StepKind } from '../interfaces/plan.js';

export type ErrorCode =
  | 'PLANNING_FAILED'
  | 'STEP_FAILED'
  | 'DELIVERY_FAILED'
  | 'PERSISTENCE_FAILED'
  | 'REQUEST_INVALID'
  | 'CONFIGURATION_INVALID';

/** Root of every error the orchestration layer raises on purpose. */
export class OrchestrationError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The plan is malformed or a dependency cannot be resolved. */
export class PlanningError extends OrchestrationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PLANNING_FAILED', options);
  }
}

/** A step executor failed or timed out. Aborts the whole run. */
export class StepExecutionError extends OrchestrationError {
  constructor(
    message: string,
    readonly kind: StepKind,
    readonly stepId: number,
    options?: { cause?: unknown },
  ) {
    super(message, 'STEP_FAILED', options);
  }
}

/** Pushing a payload to a live connection failed. */
export class DeliveryError extends OrchestrationError {
  constructor(
    message: string,
    readonly clientId: string,
    options?: { cause?: unknown },
  ) {
    super(message, 'DELIVERY_FAILED', options);
  }
}

/** The history store rejected a session. Never fails the request. */
export class PersistenceError extends OrchestrationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PERSISTENCE_FAILED', options);
  }
}

export class RequestValidationError extends OrchestrationError {
  constructor(readonly errors: readonly string[]) {
    super(`Invalid request: ${errors.join('; ')}`, 'REQUEST_INVALID');
  }
}

export class ConfigurationError extends OrchestrationError {
  constructor(readonly errors: readonly string[]) {
    super(`Invalid configuration: ${errors.join('; ')}`, 'CONFIGURATION_INVALID');
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
