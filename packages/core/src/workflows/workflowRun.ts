import {
  WorkflowAbortError,
  WorkflowExecutionError,
  WorkflowInjectionError,
  WorkflowStepError,
  WorkflowTimeoutError,
} from "./errors.js";
import {
  humanResponseEvent,
  isInputRequiredEvent,
  isStopEvent,
  startEvent,
  type AnyWorkflowEvent,
  type OutwardEvent,
  type WorkflowEvents,
} from "./events.js";
import { EventBarrier } from "./barrier.js";
import { WorkflowContext } from "./context.js";
import { WorkflowEventStream } from "./eventStream.js";
import type { StepRegistry } from "./registry.js";
import type { WorkflowStep } from "./steps/step.js";
import {
  WorkflowRunTelemetry,
  type WorkflowTelemetryResolvedConfig,
} from "./telemetry.js";
import type {
  StateShape,
  StepContext,
  TerminalRunStatus,
  WorkflowRunSnapshot,
  WorkflowRunStatus,
} from "./types.js";
import { createDeferred, mergeSignals } from "./utils/runtime.js";
import type { Logger } from "../logging/logger.js";

export interface WorkflowRunInit<
  Args extends StateShape,
  Result,
  Custom extends AnyWorkflowEvent,
  State extends StateShape,
  Artifact,
> {
  workflowId: string;
  description?: string;
  runId: string;
  args: Args;
  registry: StepRegistry<WorkflowEvents<Args, Result, Custom, Artifact>, State>;
  timeoutMs: number;
  logger: Logger;
  telemetry?: WorkflowTelemetryResolvedConfig;
  signal?: AbortSignal;
}

type Outcome<Result> = { result: Result } | { error: unknown };

const TERMINAL_STATUSES = new Set<WorkflowRunStatus>(["completed", "failed", "timed_out", "cancelled"]);

/**
 * Handle on one execution of a workflow.
 *
 * Dispatch is pull based: queued events are only routed while somebody waits
 * on the outward sequence or has asked for `result()`. Step bodies already in
 * flight keep running regardless.
 */
export class WorkflowRun<
  Args extends StateShape,
  Result,
  Custom extends AnyWorkflowEvent = never,
  State extends StateShape = StateShape,
  Artifact = Result,
> implements AsyncIterable<OutwardEvent<Result, Artifact>> {
  readonly workflowId: string;
  readonly runId: string;
  private readonly description?: string;
  private readonly args: Args;
  private readonly registry: StepRegistry<WorkflowEvents<Args, Result, Custom, Artifact>, State>;
  private readonly context = new WorkflowContext<WorkflowEvents<Args, Result, Custom, Artifact>, State>();
  private readonly barrier = new EventBarrier<WorkflowEvents<Args, Result, Custom, Artifact>>();
  private readonly stream = new WorkflowEventStream<OutwardEvent<Result, Artifact>>();
  private readonly outcome = createDeferred<Result>();
  private readonly controller = new AbortController();
  private readonly signal: AbortSignal;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly telemetry?: WorkflowRunTelemetry;
  private changed = createDeferred<void>();
  private currentStatus: WorkflowRunStatus = "running";
  private activeSteps = 0;
  private resultRequested = false;
  private inputOutstanding = false;
  private started = false;
  private timer?: ReturnType<typeof setTimeout>;
  private startedAt = new Date();
  private finishedAt?: Date;
  private failure?: unknown;

  constructor(init: WorkflowRunInit<Args, Result, Custom, State, Artifact>) {
    this.workflowId = init.workflowId;
    this.runId = init.runId;
    this.description = init.description;
    this.args = init.args;
    this.registry = init.registry;
    this.timeoutMs = init.timeoutMs;
    this.logger = init.logger.child(init.runId);
    this.signal = mergeSignals(init.signal ? [this.controller.signal, init.signal] : [this.controller.signal]);

    if (init.telemetry) {
      this.telemetry = new WorkflowRunTelemetry({
        workflowId: init.workflowId,
        runId: init.runId,
        description: init.description,
        config: init.telemetry,
      });
    }

    // result() is optional for callers; a failed run must not surface as an unhandled rejection.
    this.outcome.promise.catch(() => undefined);
  }

  get status(): WorkflowRunStatus {
    return this.currentStatus;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATUSES.has(this.currentStatus);
  }

  /** Enqueues the start event and arms the timeout. Called once by the workflow. */
  start(): this {
    if (this.started) {
      throw new WorkflowExecutionError(`Run ${this.runId} was already started`);
    }

    this.started = true;
    this.startedAt = new Date();
    this.telemetry?.startWorkflow({ startedAt: this.startedAt, input: this.args });
    this.logger.info("Workflow run started", { workflowId: this.workflowId });

    if (this.signal.aborted) {
      this.finish("cancelled", { error: new WorkflowAbortError() });
      return this;
    }

    this.signal.addEventListener(
      "abort",
      () => this.finish("cancelled", { error: new WorkflowAbortError() }),
      { once: true },
    );

    this.timer = setTimeout(() => {
      this.finish("timed_out", { error: new WorkflowTimeoutError(this.timeoutMs) });
    }, this.timeoutMs);

    this.context.enqueue(startEvent(this.args));
    void this.drive().catch((error: unknown) => {
      this.finish("failed", { error: new WorkflowExecutionError("Workflow dispatch loop crashed", error) });
    });

    return this;
  }

  /** Outward sequence of `input_required` and `stop` events. */
  events(): AsyncIterableIterator<OutwardEvent<Result, Artifact>> {
    return this.stream.iterator(() => this.notify());
  }

  [Symbol.asyncIterator](): AsyncIterator<OutwardEvent<Result, Artifact>> {
    return this.events();
  }

  /** Drives the run to its end and resolves with the stop result. */
  result(): Promise<Result> {
    this.resultRequested = true;
    this.notify();
    return this.outcome.promise;
  }

  resumeWithHumanInput({ response }: { response: string }): void {
    if (this.currentStatus !== "suspended") {
      throw new WorkflowInjectionError(
        `Run ${this.runId} is ${this.currentStatus} and is not waiting for input`,
        this.currentStatus,
      );
    }

    const receivedAt = new Date();
    this.inputOutstanding = false;
    this.currentStatus = "running";
    this.context.enqueue(humanResponseEvent(response));
    this.telemetry?.markHumanResponse(receivedAt);
    this.logger.info("Human response received, resuming");
    this.notify();
  }

  cancel(reason?: string): void {
    this.finish("cancelled", { error: new WorkflowAbortError(reason) });
  }

  snapshot(): WorkflowRunSnapshot {
    return {
      runId: this.runId,
      workflowId: this.workflowId,
      status: this.currentStatus,
      startedAt: this.startedAt,
      finishedAt: this.finishedAt,
      activeSteps: this.activeSteps,
      pendingEvents: this.context.pendingCount,
      error: this.failure,
    };
  }

  /** Frozen copy of the key/value store; empty once the run has terminated. */
  getState(): Readonly<Partial<State>> {
    return this.context.store.snapshot();
  }

  private hasDemand() {
    return this.resultRequested || this.stream.pendingConsumers > 0;
  }

  private notify() {
    const current = this.changed;
    this.changed = createDeferred<void>();
    current.resolve();
  }

  private async drive(): Promise<void> {
    while (!this.isTerminal) {
      if (this.currentStatus === "running" && this.hasDemand()) {
        const event = this.context.dequeue();
        if (event !== undefined) {
          this.dispatch(event);
          continue;
        }
      }

      await this.changed.promise;
    }
  }

  private dispatch(event: WorkflowEvents<Args, Result, Custom, Artifact>) {
    if (isStopEvent<Result>(event)) {
      this.stream.push(event);
      this.finish("completed", { result: event.payload.result });
      return;
    }

    if (isInputRequiredEvent<Artifact>(event)) {
      const requestedAt = new Date();
      this.currentStatus = "suspended";
      this.telemetry?.markInputRequired(event.payload.prefix, requestedAt);
      this.logger.info("Waiting for human input");
      this.stream.push(event);
      return;
    }

    const steps = this.registry.resolve(event.kind);
    if (steps.length === 0) {
      this.logger.debug("No step accepts event, dropping it", { kind: event.kind });
      return;
    }

    this.logger.debug("Dispatching event", { kind: event.kind, steps: steps.map((step) => step.id) });
    for (const step of steps) {
      this.execute(step, event);
    }
  }

  private execute(
    step: WorkflowStep<WorkflowEvents<Args, Result, Custom, Artifact>, State>,
    event: WorkflowEvents<Args, Result, Custom, Artifact>,
  ) {
    const handle = this.telemetry?.startStep({ step, eventKind: event.kind, startedAt: new Date() });
    const ctx = this.createStepContext(step);
    this.activeSteps += 1;

    const task = async () => {
      const run = () => step.execute({ event, ctx, signal: this.signal });
      const produced = await (this.telemetry ? this.telemetry.runWithStepContext(handle, run) : run());

      this.telemetry?.recordStepSuccess(handle, { finishedAt: new Date(), input: event, output: produced });

      if (produced !== undefined) {
        this.emit(step, produced);
      }
    };

    void task()
      .catch((error: unknown) => {
        this.telemetry?.recordStepError(handle, { finishedAt: new Date(), error });
        if (!this.isTerminal) {
          this.logger.error(`Step ${step.id} failed`, { error });
          this.finish("failed", { error: new WorkflowStepError(step.id, error) });
        }
      })
      .finally(() => {
        this.activeSteps -= 1;
        this.notify();
      });
  }

  private emit(
    step: WorkflowStep<WorkflowEvents<Args, Result, Custom, Artifact>, State>,
    event: WorkflowEvents<Args, Result, Custom, Artifact>,
  ) {
    if (this.isTerminal) {
      return;
    }

    if (!step.mayEmit(event.kind)) {
      this.finish("failed", {
        error: new WorkflowStepError(
          step.id,
          new WorkflowExecutionError(`Step ${step.id} emitted undeclared event kind ${event.kind}`),
        ),
      });
      return;
    }

    if (isInputRequiredEvent<Artifact>(event)) {
      if (this.inputOutstanding) {
        this.finish("failed", {
          error: new WorkflowStepError(
            step.id,
            new WorkflowExecutionError("input_required emitted while another request is unanswered"),
          ),
        });
        return;
      }

      this.inputOutstanding = true;
    }

    this.context.enqueue(event);
    this.notify();
  }

  private createStepContext(
    step: WorkflowStep<WorkflowEvents<Args, Result, Custom, Artifact>, State>,
  ): StepContext<WorkflowEvents<Args, Result, Custom, Artifact>, State> {
    return {
      workflowId: this.workflowId,
      runId: this.runId,
      stepId: step.id,
      store: this.context.store,
      logger: this.logger.child(step.id),
      sendEvent: (event) => this.emit(step, event),
      collectEvents: (event, required) => this.barrier.collect(step.id, event, required),
    };
  }

  private finish(status: TerminalRunStatus, outcome: Outcome<Result>) {
    if (this.isTerminal) {
      return;
    }

    this.currentStatus = status;
    this.finishedAt = new Date();
    clearTimeout(this.timer);

    const error = "error" in outcome ? outcome.error : undefined;
    if (!this.controller.signal.aborted) {
      this.controller.abort(error ?? new WorkflowAbortError("Workflow run finished"));
    }

    this.context.release();
    this.barrier.release();

    const durationMs = this.finishedAt.getTime() - this.startedAt.getTime();
    this.telemetry?.finishWorkflow({
      finishedAt: this.finishedAt,
      status,
      output: "result" in outcome ? outcome.result : undefined,
      error,
    });

    if ("result" in outcome) {
      this.logger.info("Workflow run completed", { durationMs });
      this.outcome.resolve(outcome.result);
      this.stream.end();
    } else {
      this.failure = outcome.error;
      this.logger.warn(`Workflow run ${status}`, { durationMs, error: outcome.error });
      this.outcome.reject(outcome.error);
      this.stream.fail(outcome.error);
    }

    this.notify();
  }
}
