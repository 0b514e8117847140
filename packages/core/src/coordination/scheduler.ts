/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ExecutorSet, StepContext } from '../agents/agent.js';
import { buildStepContext } from '../context/broker.js';
import { PlanningError, StepExecutionError, toErrorMessage } from '../core/errors.js';
import { silentReporter, type ActivityReporter, type AgentLabel } from '../event-bus/types.js';
import {
  STEP_LABELS,
  recordResult,
  type ExecutionPlan,
  type PlanStep,
  type StepResult,
  type StepResults,
} from '../interfaces/plan.js';
import type { AgentRequest } from '../interfaces/request.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { validatePlan } from './planner.js';
import { withTimeout } from './recovery.js';

/** Hands out a reporter already bound to the requesting client. */
export type ReporterFactory = (agent: AgentLabel) => ActivityReporter;

export interface SchedulerOptions {
  stepTimeoutMs?: number;
  logger?: Logger;
}

type Phase = 'parallel' | 'sequential' | 'dependent';

interface RunState {
  readonly results: StepResults;
  readonly byId: Map<number, StepResult>;
  aborted: boolean;
}

/**
 * Runs a plan in two tiers: steps without dependencies first (concurrently
 * when the plan allows it), then dependent steps in plan order. The first
 * failing step aborts the run.
 */
export class Scheduler {
  private readonly stepTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly executors: ExecutorSet,
    options: SchedulerOptions = {},
  ) {
    this.stepTimeoutMs = options.stepTimeoutMs ?? 120_000;
    this.logger = options.logger ?? createLogger('scheduler');
  }

  async run(
    plan: ExecutionPlan,
    request: AgentRequest,
    reporters: ReporterFactory = () => silentReporter,
  ): Promise<StepResults> {
    validatePlan(plan);
    const state: RunState = { results: {}, byId: new Map(), aborted: false };

    const ready = plan.steps.filter((s) => s.dependsOn.length === 0);
    const pending = plan.steps.filter((s) => s.dependsOn.length > 0);

    if (plan.mode === 'parallel' && ready.length > 1) {
      // Every "started" goes out before any step is awaited.
      const launched = ready.map((step) => {
        const reporter = reporters(step.kind);
        reporter.report(this.startedMessage('parallel', step));
        return { step, reporter };
      });
      await Promise.all(
        launched.map(async ({ step, reporter }) => {
          const result = await this.runStep(step, request.query, buildStepContext(step.kind, request), reporter, state);
          if (state.aborted) return;
          this.record(state, step, result);
          reporter.report(this.completedMessage('parallel', step));
        }),
      );
    } else {
      for (const step of ready) {
        const reporter = reporters(step.kind);
        reporter.report(this.startedMessage('sequential', step));
        const result = await this.runStep(step, request.query, buildStepContext(step.kind, request), reporter, state);
        this.record(state, step, result);
        reporter.report(this.completedMessage('sequential', step));
      }
    }

    for (const step of pending) {
      const dependencies: StepResults = {};
      for (const depId of step.dependsOn) {
        const dep = state.byId.get(depId);
        if (!dep) {
          throw new PlanningError(`Step ${step.id} depends on step ${depId}, which produced no result`);
        }
        recordResult(dependencies, dep);
      }
      const reporter = reporters(step.kind);
      reporter.report(this.startedMessage('dependent', step));
      const context = buildStepContext(step.kind, request, dependencies);
      const result = await this.runStep(step, request.query, context, reporter, state);
      this.record(state, step, result);
      reporter.report(this.completedMessage('dependent', step));
    }

    return state.results;
  }

  private async runStep(
    step: PlanStep,
    query: string,
    context: StepContext,
    reporter: ActivityReporter,
    state: RunState,
  ): Promise<StepResult> {
    const executor = this.executors[step.kind];
    try {
      const execution: Promise<StepResult> = executor.execute(query, context, reporter);
      const result = await withTimeout(execution, this.stepTimeoutMs);
      if (result.kind !== step.kind) {
        throw new Error(`executor for ${step.kind} returned a ${result.kind} result`);
      }
      this.logger.debug(`Step ${step.id} (${step.kind}) finished in ${result.durationMs}ms`);
      return result;
    } catch (cause) {
      const message = toErrorMessage(cause);
      // Only the first failure is reported; later ones belong to an aborted run.
      if (!state.aborted) {
        state.aborted = true;
        reporter.report(`${STEP_LABELS[step.kind]} failed: ${message}`, true);
        this.logger.error(`Step ${step.id} (${step.kind}) failed: ${message}`);
      }
      throw cause instanceof StepExecutionError
        ? cause
        : new StepExecutionError(message, step.kind, step.id, { cause });
    }
  }

  private record(state: RunState, step: PlanStep, result: StepResult): void {
    recordResult(state.results, result);
    state.byId.set(step.id, result);
  }

  private startedMessage(phase: Phase, step: PlanStep): string {
    return `Starting ${phase} execution for ${STEP_LABELS[step.kind]}: ${step.description}`;
  }

  private completedMessage(phase: Phase, step: PlanStep): string {
    return `Completed ${phase} execution for ${STEP_LABELS[step.kind]}.`;
  }
}
