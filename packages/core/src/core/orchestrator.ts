/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { randomUUID } from 'node:crypto';
import { analyzeRequest, buildPlan, validatePlan } from '../coordination/planner.js';
import type { Scheduler } from '../coordination/scheduler.js';
import type { ProgressBus } from '../event-bus/progressBus.js';
import { silentReporter, type ActivityReporter, type AgentLabel } from '../event-bus/types.js';
import type { ExecutionPlan, SuccessOutcome } from '../interfaces/plan.js';
import { combinedContextText, type AgentRequest } from '../interfaces/request.js';
import type { HistoryStore, SessionRecord } from '../services/historyStore.js';
import { deepFreeze } from '../utils/deepFreeze.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { PersistenceError, StepExecutionError, toErrorMessage } from './errors.js';
import type { Synthesizer } from './synthesizer.js';

export interface OrchestratorOptions {
  scheduler: Scheduler;
  synthesizer: Synthesizer;
  orchestratorModel: string;
  /** Without a bus, progress is not published anywhere. */
  bus?: ProgressBus;
  history?: HistoryStore;
  logger?: Logger;
}

/**
 * analyze → plan → run → synthesize for one request, publishing plan-level
 * progress as the orchestrator and recording the session in history.
 */
export class Orchestrator {
  private readonly logger: Logger;

  constructor(private readonly options: OrchestratorOptions) {
    this.logger = options.logger ?? createLogger('orchestrator');
  }

  async execute(request: AgentRequest, clientId?: string): Promise<SuccessOutcome> {
    const startedAt = performance.now();
    const sessionId = randomUUID();
    const { scheduler, synthesizer } = this.options;
    const orchestrator = this.reporter(clientId, 'orchestrator');
    let plan: ExecutionPlan | undefined;

    try {
      orchestrator.report('Analyzing request...');
      const analysis = analyzeRequest(request);
      orchestrator.report('Request analysis complete.');
      this.logger.debug(analysis.summary);

      orchestrator.report('Creating execution plan...');
      plan = validatePlan(buildPlan(analysis));
      orchestrator.report('Execution plan created.');

      orchestrator.report('Executing plan...');
      const results = await scheduler.run(plan, request, (agent) => this.reporter(clientId, agent));
      orchestrator.report('Plan execution complete.');

      orchestrator.report('Synthesizing results from all agents.');
      const report = synthesizer.compose(results, plan, request);
      orchestrator.report('Synthesis complete.');

      const outcome = deepFreeze<SuccessOutcome>({
        status: 'SUCCESS',
        sessionId,
        request,
        analysis,
        plan,
        results,
        report,
        durationMs: Math.round(performance.now() - startedAt),
        completedAt: new Date().toISOString(),
      });
      await this.persist(this.sessionOf(outcome, sessionId, plan, report));
      this.logger.info(`Session ${sessionId} completed in ${outcome.durationMs}ms`);
      return outcome;
    } catch (error) {
      const message = toErrorMessage(error);
      // Step failures were already reported by the scheduler, under the step's own label.
      if (!(error instanceof StepExecutionError)) {
        orchestrator.report(`Execution failed: ${message}`, true);
      }
      if (plan) {
        await this.persist({
          id: sessionId,
          input: request.query,
          context: combinedContextText(request.context),
          result: message,
          plan,
          status: 'FAILURE',
          durationMs: Math.round(performance.now() - startedAt),
          timestamp: new Date().toISOString(),
          model: this.options.orchestratorModel,
        });
      }
      throw error;
    }
  }

  private reporter(clientId: string | undefined, agent: AgentLabel): ActivityReporter {
    return this.options.bus ? this.options.bus.reporter(clientId, agent) : silentReporter;
  }

  private sessionOf(outcome: SuccessOutcome, id: string, plan: ExecutionPlan, report: string): SessionRecord {
    return {
      id,
      input: outcome.request.query,
      context: combinedContextText(outcome.request.context),
      result: report,
      plan,
      status: 'SUCCESS',
      durationMs: outcome.durationMs,
      timestamp: outcome.completedAt,
      model: this.options.orchestratorModel,
    };
  }

  /** History is best effort: a failed write is logged, the outcome still stands. */
  private async persist(session: SessionRecord): Promise<void> {
    const history = this.options.history;
    if (!history) return;
    try {
      await history.save(session);
    } catch (error) {
      const failure =
        error instanceof PersistenceError
          ? error
          : new PersistenceError(`Saving session ${session.id} failed: ${toErrorMessage(error)}`, { cause: error });
      this.logger.error(failure.message);
    }
  }
}
