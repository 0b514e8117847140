/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { randomUUID } from 'node:crypto';
import type { ValidateFunction } from 'ajv';
import type { SubmissionJob, TaskQueue } from '../coordination/taskQueue.js';
import type { ProgressBus } from '../event-bus/progressBus.js';
import type { ResultEvent } from '../event-bus/types.js';
import type { ExecutionOutcome, FailureOutcome } from '../interfaces/plan.js';
import { freezeRequest, type AgentRequest } from '../interfaces/request.js';
import { deepFreeze } from '../utils/deepFreeze.js';
import { compileValidator, formatErrors } from '../utils/jsonValidator.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { RequestValidationError, toErrorMessage } from './errors.js';
import type { Orchestrator } from './orchestrator.js';

let requestValidator: ValidateFunction<AgentRequest> | undefined;

/** Validate an untrusted value against `request.schema.json` and freeze it. */
export function parseRequest(input: unknown): AgentRequest {
  const validate = (requestValidator ??= compileValidator<AgentRequest>('request.schema.json'));
  if (!validate(input)) {
    throw new RequestValidationError(formatErrors(validate.errors));
  }
  return freezeRequest(input);
}

export interface SubmissionOptions {
  orchestrator: Orchestrator;
  bus: ProgressBus;
  /** Needed for `submitAsync`; a consumer-only worker can omit it. */
  queue?: TaskQueue;
  logger?: Logger;
}

/**
 * The boundary between callers and the engine. Synchronous submissions get
 * an outcome back; asynchronous ones get a task id and later a result event
 * on `agent_results:<clientId>`.
 */
export class SubmissionService {
  private readonly logger: Logger;

  constructor(private readonly options: SubmissionOptions) {
    this.logger = options.logger ?? createLogger('submission');
  }

  /** Never throws; every failure becomes a FAILURE outcome. */
  async submit(input: unknown, clientId?: string): Promise<ExecutionOutcome> {
    const startedAt = performance.now();
    let request: AgentRequest | undefined;
    try {
      request = parseRequest(input);
      return await this.options.orchestrator.execute(request, clientId);
    } catch (error) {
      const message = toErrorMessage(error);
      this.logger.error(`Submission${clientId ? ` for ${clientId}` : ''} failed: ${message}`);
      return deepFreeze<FailureOutcome>({
        status: 'FAILURE',
        ...(request ? { request } : {}),
        error: message,
        durationMs: Math.round(performance.now() - startedAt),
        completedAt: new Date().toISOString(),
      });
    }
  }

  /**
   * Validate and enqueue. Invalid requests are rejected here, before a task
   * exists. Passing an existing `taskId` again does not run it twice.
   */
  async submitAsync(input: unknown, clientId: string, taskId: string = randomUUID()): Promise<{ taskId: string }> {
    const queue = this.options.queue;
    if (!queue) {
      throw new Error('Asynchronous submission needs a task queue');
    }
    const request = parseRequest(input);
    await queue.enqueue({ taskId, clientId, request });
    this.logger.info(`Task ${taskId} queued for ${clientId}`);
    return { taskId };
  }

  /** Queue consumer: run the job and publish its outcome as a result event. */
  async processJob(job: SubmissionJob): Promise<ExecutionOutcome> {
    const outcome = await this.submit(job.request, job.clientId);
    const timestamp = new Date().toISOString();
    const event: ResultEvent =
      outcome.status === 'SUCCESS'
        ? { type: 'result', task_id: job.taskId, status: 'SUCCESS', result: outcome, timestamp }
        : { type: 'result', task_id: job.taskId, status: 'FAILURE', error: outcome.error, timestamp };
    this.options.bus.publishResult(job.clientId, event);
    return outcome;
  }
}
