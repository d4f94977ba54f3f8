export * from "./errors.js";
export * from "./types.js";
export * from "./events.js";

export { WorkflowStep, createStep } from "./steps/step.js";
export { EventBarrier, requireKinds } from "./barrier.js";
export { WorkflowContext } from "./context.js";
export { StepRegistry } from "./registry.js";
export { WorkflowEventStream } from "./eventStream.js";
export { WorkflowBuilder, createWorkflow } from "./workflowBuilder.js";
export { Workflow, DEFAULT_RUN_TIMEOUT_MS } from "./workflow.js";
export { WorkflowRun } from "./workflowRun.js";
export { resolveWorkflowTelemetryConfig, WorkflowRunTelemetry } from "./telemetry.js";
export type { WorkflowTelemetryResolvedConfig } from "./telemetry.js";
export { parseWithSchema } from "./utils/validation.js";
