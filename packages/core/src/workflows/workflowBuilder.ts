import { WorkflowDefinitionError } from "./errors.js";
import type { AnyWorkflowEvent, WorkflowEvents } from "./events.js";
import { StepRegistry } from "./registry.js";
import { WorkflowStep } from "./steps/step.js";
import type { StateShape, WorkflowConfig, WorkflowStepConfig } from "./types.js";
import { DEFAULT_RUN_TIMEOUT_MS, Workflow } from "./workflow.js";
import { createSilentLogger } from "../logging/logger.js";

export class WorkflowBuilder<
  Args extends StateShape,
  Result,
  Custom extends AnyWorkflowEvent = never,
  State extends StateShape = StateShape,
  Artifact = Result,
> {
  private readonly registry = new StepRegistry<WorkflowEvents<Args, Result, Custom, Artifact>, State>();

  constructor(private readonly config: WorkflowConfig<Args>) {}

  step<Accepts extends WorkflowEvents<Args, Result, Custom, Artifact>["kind"]>(
    config: WorkflowStepConfig<WorkflowEvents<Args, Result, Custom, Artifact>, Accepts, State>,
  ): this {
    this.registry.register(WorkflowStep.from(config));
    return this;
  }

  addStep(step: WorkflowStep<WorkflowEvents<Args, Result, Custom, Artifact>, State>): this {
    this.registry.register(step);
    return this;
  }

  commit(): Workflow<Args, Result, Custom, State, Artifact> {
    const timeoutMs = this.config.timeoutMs ?? DEFAULT_RUN_TIMEOUT_MS;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new WorkflowDefinitionError(`Workflow ${this.config.id} needs a positive timeout, got ${timeoutMs}`);
    }

    this.registry.freeze();

    return new Workflow<Args, Result, Custom, State, Artifact>(
      {
        id: this.config.id,
        description: this.config.description,
        inputSchema: this.config.inputSchema,
        required: this.config.required ?? [],
        timeoutMs,
        logger: this.config.logger ?? createSilentLogger(),
        telemetry: this.config.telemetry,
      },
      this.registry,
    );
  }
}

export const createWorkflow = <
  Args extends StateShape,
  Result,
  Custom extends AnyWorkflowEvent = never,
  State extends StateShape = StateShape,
  Artifact = Result,
>(config: WorkflowConfig<Args>) =>
  new WorkflowBuilder<Args, Result, Custom, State, Artifact>(config);
