import type { Logger } from "../logging/logger.js";
import type { AnyWorkflowEvent } from "./events.js";

export type SchemaLike<T> = {
  parse?: (data: unknown) => T;
  safeParse?: (data: unknown) => { success: true; data: T } | { success: false; error: unknown };
};

export type InferSchemaType<Schema> = Schema extends SchemaLike<infer T> ? T : never;

export type MaybePromise<T> = T | Promise<T>;

export type StateShape = Record<string, unknown>;

export type StateKey<State extends StateShape> = Extract<keyof State, string>;

export interface WorkflowTelemetryOverrides {
  traceName?: string;
  metadata?: Record<string, unknown>;
  recordInputs?: boolean;
  recordOutputs?: boolean;
}

export type WorkflowTelemetryOption =
  | boolean
  | WorkflowTelemetryOverrides;

export type WorkflowRunStatus =
  | "running"
  | "suspended"
  | "completed"
  | "failed"
  | "timed_out"
  | "cancelled";

export type TerminalRunStatus = Extract<WorkflowRunStatus, "completed" | "failed" | "timed_out" | "cancelled">;

export type BarrierResult<E extends AnyWorkflowEvent> =
  | { status: "batch"; events: E[] }
  | { status: "incomplete" };

export interface ContextStore<State extends StateShape> {
  get<K extends StateKey<State>>(key: K): State[K] | undefined;
  /** Like `get`, but throws when the key was never written. */
  require<K extends StateKey<State>>(key: K): State[K];
  set<K extends StateKey<State>>(key: K, value: State[K]): void;
  has(key: StateKey<State>): boolean;
}

/**
 * What a step body sees of its run.
 */
export interface StepContext<E extends AnyWorkflowEvent, State extends StateShape> {
  readonly workflowId: string;
  readonly runId: string;
  readonly stepId: string;
  readonly store: ContextStore<State>;
  readonly logger: Logger;
  /** Enqueues an event; several calls keep production order. */
  sendEvent(event: E): void;
  /**
   * Buffers `event` for this step and releases a batch once every kind in
   * `required` has arrived as many times as it is listed. Pass `undefined`
   * while the expected count is not known yet.
   */
  collectEvents<K extends E["kind"]>(
    event: E,
    required: readonly K[] | undefined,
  ): BarrierResult<Extract<E, { kind: K }>>;
}

export interface StepHandlerArgs<E extends AnyWorkflowEvent, Incoming extends E, State extends StateShape> {
  event: Incoming;
  ctx: StepContext<E, State>;
  signal: AbortSignal;
}

export type StepHandler<E extends AnyWorkflowEvent, Incoming extends E, State extends StateShape> = (
  args: StepHandlerArgs<E, Incoming, State>,
) => MaybePromise<E | void>;

export interface WorkflowStepConfig<
  E extends AnyWorkflowEvent,
  Accepts extends E["kind"],
  State extends StateShape,
> {
  id: string;
  description?: string;
  accepts: readonly Accepts[];
  /** Kinds the step may produce. Producing anything else fails the run. */
  emits?: readonly E["kind"][];
  handler: StepHandler<E, Extract<E, { kind: Accepts }>, State>;
}

export interface WorkflowConfig<Args extends StateShape> {
  id: string;
  description?: string;
  /** Validates and types the run arguments. */
  inputSchema: SchemaLike<Args>;
  /** Arguments reported by name when absent, `null` or blank. */
  required?: readonly StateKey<Args>[];
  /** Wall-clock budget of a run in milliseconds. */
  timeoutMs?: number;
  logger?: Logger;
  telemetry?: WorkflowTelemetryOption;
}

export interface WorkflowRunOptions {
  runId?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  telemetry?: WorkflowTelemetryOption;
}

/** Run arguments as callers hand them in, before validation. */
export type RunArguments<Args extends StateShape> = {
  [K in keyof Args]?: Args[K] | null;
};

export interface WorkflowRunSnapshot {
  runId: string;
  workflowId: string;
  status: WorkflowRunStatus;
  startedAt: Date;
  finishedAt?: Date;
  activeSteps: number;
  pendingEvents: number;
  error?: unknown;
}

export interface WorkflowStepInspection {
  id: string;
  description?: string;
  accepts: string[];
  emits?: string[];
}

export interface WorkflowInspection {
  id: string;
  description?: string;
  steps: WorkflowStepInspection[];
  routes: Record<string, string[]>;
}
