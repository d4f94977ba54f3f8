import { WorkflowSchemaError, WorkflowValidationError } from "./errors.js";
import type { AnyWorkflowEvent, WorkflowEvents } from "./events.js";
import type { StepRegistry } from "./registry.js";
import { resolveWorkflowTelemetryConfig } from "./telemetry.js";
import type {
  RunArguments,
  SchemaLike,
  StateKey,
  StateShape,
  WorkflowInspection,
  WorkflowRunOptions,
  WorkflowTelemetryOption,
} from "./types.js";
import { createRunId } from "./utils/runtime.js";
import { findMissingKeys, parseWithSchema } from "./utils/validation.js";
import { WorkflowRun } from "./workflowRun.js";
import type { Logger } from "../logging/logger.js";

export const DEFAULT_RUN_TIMEOUT_MS = 600_000;

export interface WorkflowRuntime<Args extends StateShape> {
  id: string;
  description?: string;
  inputSchema: SchemaLike<Args>;
  required: readonly StateKey<Args>[];
  timeoutMs: number;
  logger: Logger;
  telemetry?: WorkflowTelemetryOption;
}

export class Workflow<
  Args extends StateShape,
  Result,
  Custom extends AnyWorkflowEvent = never,
  State extends StateShape = StateShape,
  Artifact = Result,
> {
  readonly id: string;
  readonly description?: string;
  readonly timeoutMs: number;
  private readonly inputSchema: SchemaLike<Args>;
  private readonly required: readonly StateKey<Args>[];
  private readonly logger: Logger;
  private readonly telemetry?: WorkflowTelemetryOption;
  private readonly registry: StepRegistry<WorkflowEvents<Args, Result, Custom, Artifact>, State>;

  constructor(
    config: WorkflowRuntime<Args>,
    registry: StepRegistry<WorkflowEvents<Args, Result, Custom, Artifact>, State>,
  ) {
    this.id = config.id;
    this.description = config.description;
    this.inputSchema = config.inputSchema;
    this.required = config.required;
    this.timeoutMs = config.timeoutMs;
    this.logger = config.logger;
    this.telemetry = config.telemetry;
    this.registry = registry;
  }

  /**
   * Validates `args` and starts a run without waiting for it. Throws
   * `WorkflowValidationError` before anything is dispatched.
   */
  run(
    args: RunArguments<Args>,
    options: WorkflowRunOptions = {},
  ): WorkflowRun<Args, Result, Custom, State, Artifact> {
    const validated = this.validateArgs(args);
    const runId = options.runId ?? createRunId();

    return new WorkflowRun<Args, Result, Custom, State, Artifact>({
      workflowId: this.id,
      description: this.description,
      runId,
      args: validated,
      registry: this.registry,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      logger: this.logger,
      telemetry: resolveWorkflowTelemetryConfig({
        workflowId: this.id,
        baseOption: this.telemetry,
        overrideOption: options.telemetry,
      }),
      signal: options.signal,
    }).start();
  }

  validateArgs(args: unknown): Args {
    const missing = findMissingKeys(args, this.required);
    if (missing.length > 0) {
      throw new WorkflowValidationError(`Missing required run arguments: ${missing.join(", ")}`, missing);
    }

    try {
      return parseWithSchema(this.inputSchema, args, `workflow ${this.id} arguments`);
    } catch (error) {
      if (error instanceof WorkflowSchemaError) {
        throw new WorkflowValidationError(error.message, [], error.cause);
      }
      throw error;
    }
  }

  inspect(): WorkflowInspection {
    return {
      id: this.id,
      description: this.description,
      steps: this.registry.list().map((step) => step.inspect()),
      routes: this.registry.routingTable(),
    };
  }
}
