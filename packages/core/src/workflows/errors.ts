export class WorkflowSchemaError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "WorkflowSchemaError";
  }
}

export class WorkflowDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WorkflowDefinitionError";
  }
}

export class WorkflowValidationError extends Error {
  constructor(
    message: string,
    public readonly missing: readonly string[] = [],
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "WorkflowValidationError";
  }
}

export class WorkflowAbortError extends Error {
  constructor(message = "Workflow run aborted") {
    super(message);
    this.name = "WorkflowAbortError";
  }
}

export class WorkflowExecutionError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "WorkflowExecutionError";
  }
}

export class WorkflowStepError extends Error {
  constructor(
    public readonly stepId: string,
    public readonly cause?: unknown,
  ) {
    super(`Step ${stepId} failed: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "WorkflowStepError";
  }
}

export class WorkflowTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Workflow run exceeded its ${timeoutMs}ms budget`);
    this.name = "WorkflowTimeoutError";
  }
}

export class WorkflowInjectionError extends Error {
  constructor(message: string, public readonly status: string) {
    super(message);
    this.name = "WorkflowInjectionError";
  }
}
