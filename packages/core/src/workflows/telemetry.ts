import {
  context as otelContext,
  trace,
  SpanStatusCode,
  type Context,
  type Span,
} from "@opentelemetry/api";

import type {
  TerminalRunStatus,
  WorkflowTelemetryOption,
  WorkflowTelemetryOverrides,
} from "./types.js";

const TRACER_NAME = "@formpilot/workflow";

export interface WorkflowTelemetryResolvedConfig {
  traceName: string;
  metadata?: Record<string, unknown>;
  recordInputs: boolean;
  recordOutputs: boolean;
}

interface ResolveTelemetryOptionsParams {
  workflowId: string;
  baseOption?: WorkflowTelemetryOption;
  overrideOption?: WorkflowTelemetryOption;
}

interface WorkflowRunTelemetryParams {
  workflowId: string;
  runId: string;
  description?: string;
  config: WorkflowTelemetryResolvedConfig;
}

interface StartStepArgs {
  step: { id: string; description?: string };
  eventKind: string;
  startedAt: Date;
}

export interface StepTelemetryHandle {
  readonly span: Span;
  readonly context: Context;
  readonly stepId: string;
}

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const toOverrides = (option?: WorkflowTelemetryOption): WorkflowTelemetryOverrides | undefined => {
  if (option === undefined || option === false) {
    return undefined;
  }

  if (option === true) {
    return {};
  }

  return option;
};

const optionIsEnabled = (option?: WorkflowTelemetryOption): boolean =>
  option === true || isObject(option);

export const resolveWorkflowTelemetryConfig = ({
  workflowId,
  baseOption,
  overrideOption,
}: ResolveTelemetryOptionsParams): WorkflowTelemetryResolvedConfig | undefined => {
  if (overrideOption === false) {
    return undefined;
  }

  if (!optionIsEnabled(baseOption) && !optionIsEnabled(overrideOption)) {
    return undefined;
  }

  const base = toOverrides(baseOption);
  const override = toOverrides(overrideOption);

  const metadata: Record<string, unknown> = {
    ...(base?.metadata ?? {}),
    ...(override?.metadata ?? {}),
  };

  return {
    traceName: override?.traceName ?? base?.traceName ?? workflowId,
    metadata: Object.keys(metadata).length > 0 ? metadata : undefined,
    recordInputs: override?.recordInputs ?? base?.recordInputs ?? true,
    recordOutputs: override?.recordOutputs ?? base?.recordOutputs ?? true,
  };
};

const toAttributeValue = (value: unknown): string | number | boolean => {
  if (value === undefined) {
    return "undefined";
  }

  if (value === null) {
    return "null";
  }

  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
};

const normalizeAttributeKey = (key: string) =>
  key
    .replace(/\s+/g, "_")
    .replace(/[^\w./-]/g, "_");

const toErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }

  return typeof error === "string" ? error : toAttributeValue(error).toString();
};

const toException = (error: unknown): Error =>
  error instanceof Error ? error : new Error(toErrorMessage(error));

/**
 * One root span per run, one child span per step execution. Spans are no-ops
 * unless the host process registers an OpenTelemetry SDK.
 */
export class WorkflowRunTelemetry {
  private readonly tracer = trace.getTracer(TRACER_NAME);
  private readonly workflowId: string;
  private readonly runId: string;
  private readonly description?: string;
  private readonly config: WorkflowTelemetryResolvedConfig;

  private rootSpan?: Span;
  private rootContext: Context = otelContext.active();

  constructor(params: WorkflowRunTelemetryParams) {
    this.workflowId = params.workflowId;
    this.runId = params.runId;
    this.description = params.description;
    this.config = params.config;
  }

  startWorkflow(args: { startedAt: Date; input: unknown }) {
    this.rootSpan = this.tracer.startSpan(this.config.traceName, {
      startTime: args.startedAt,
      attributes: {
        "formpilot.workflow.id": this.workflowId,
        "formpilot.workflow.run_id": this.runId,
      },
    });

    if (this.description) {
      this.rootSpan.setAttribute("formpilot.workflow.description", this.description);
    }

    for (const [key, value] of Object.entries(this.config.metadata ?? {})) {
      this.rootSpan.setAttribute(`formpilot.workflow.metadata.${normalizeAttributeKey(key)}`, toAttributeValue(value));
    }

    if (this.config.recordInputs) {
      this.rootSpan.setAttribute("formpilot.workflow.input", toAttributeValue(args.input));
    }

    this.rootContext = trace.setSpan(otelContext.active(), this.rootSpan);
  }

  finishWorkflow(args: { finishedAt: Date; status: TerminalRunStatus; output?: unknown; error?: unknown }) {
    if (!this.rootSpan) {
      return;
    }

    this.rootSpan.setAttribute("formpilot.workflow.status", args.status);

    if (args.status === "completed") {
      if (this.config.recordOutputs && args.output !== undefined) {
        this.rootSpan.setAttribute("formpilot.workflow.output", toAttributeValue(args.output));
      }
      this.rootSpan.setStatus({ code: SpanStatusCode.OK });
    } else if (args.status === "cancelled") {
      this.rootSpan.addEvent("workflow.cancelled");
      this.rootSpan.setStatus({ code: SpanStatusCode.ERROR, message: "workflow.cancelled" });
    } else {
      this.rootSpan.recordException(toException(args.error));
      this.rootSpan.setStatus({ code: SpanStatusCode.ERROR, message: toErrorMessage(args.error) });
    }

    this.rootSpan.end(args.finishedAt);
  }

  markInputRequired(prefix: string, requestedAt: Date) {
    this.rootSpan?.addEvent("workflow.input_required", {
      prefix,
      requested_at: requestedAt.getTime(),
    });
  }

  markHumanResponse(receivedAt: Date) {
    this.rootSpan?.addEvent("workflow.human_response", {
      received_at: receivedAt.getTime(),
    });
  }

  startStep(args: StartStepArgs): StepTelemetryHandle | undefined {
    if (!this.rootSpan) {
      return undefined;
    }

    const span = this.tracer.startSpan(
      `${this.config.traceName}.step.${args.step.id}`,
      {
        startTime: args.startedAt,
        attributes: {
          "formpilot.workflow.id": this.workflowId,
          "formpilot.workflow.run_id": this.runId,
          "formpilot.workflow.step.id": args.step.id,
          "formpilot.workflow.step.event_kind": args.eventKind,
        },
      },
      this.rootContext,
    );

    if (args.step.description) {
      span.setAttribute("formpilot.workflow.step.description", args.step.description);
    }

    return {
      span,
      context: trace.setSpan(this.rootContext, span),
      stepId: args.step.id,
    };
  }

  recordStepSuccess(handle: StepTelemetryHandle | undefined, args: { finishedAt: Date; input: unknown; output: unknown }) {
    if (!handle) {
      return;
    }

    if (this.config.recordInputs) {
      handle.span.setAttribute("formpilot.workflow.step.input", toAttributeValue(args.input));
    }

    if (this.config.recordOutputs) {
      handle.span.setAttribute("formpilot.workflow.step.output", toAttributeValue(args.output));
    }

    handle.span.setStatus({ code: SpanStatusCode.OK });
    handle.span.end(args.finishedAt);
  }

  recordStepError(handle: StepTelemetryHandle | undefined, args: { finishedAt: Date; error: unknown }) {
    if (!handle) {
      return;
    }

    handle.span.recordException(toException(args.error));
    handle.span.setStatus({
      code: SpanStatusCode.ERROR,
      message: toErrorMessage(args.error),
    });
    handle.span.end(args.finishedAt);
  }

  runWithStepContext<T>(handle: StepTelemetryHandle | undefined, fn: () => T): T {
    if (!handle) {
      return fn();
    }

    return otelContext.with(handle.context, fn);
  }
}
