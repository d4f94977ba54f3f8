import { WorkflowDefinitionError } from "./errors.js";
import type { SchemaLike } from "./types.js";
import { parseWithSchema } from "./utils/validation.js";

export interface WorkflowEvent<Kind extends string = string, Payload = unknown> {
  readonly kind: Kind;
  readonly payload: Payload;
}

export type AnyWorkflowEvent = WorkflowEvent<string, unknown>;

export const SystemEventKind = {
  Start: "start",
  Stop: "stop",
  InputRequired: "input_required",
  HumanResponse: "human_response",
} as const;

export type SystemEventKind = (typeof SystemEventKind)[keyof typeof SystemEventKind];

const SYSTEM_KINDS = new Set<string>(Object.values(SystemEventKind));

export const isSystemEventKind = (kind: string): kind is SystemEventKind => SYSTEM_KINDS.has(kind);

export type StartEvent<Args = Record<string, unknown>> = WorkflowEvent<"start", Args>;

export type StopEvent<Result = unknown> = WorkflowEvent<"stop", { result: Result }>;

export interface InputRequiredPayload<Artifact = unknown> {
  /** Instruction shown to the human, e.g. "How does this look?". */
  prefix: string;
  /** The artifact the human is asked to review. */
  result: Artifact;
}

export type InputRequiredEvent<Artifact = unknown> = WorkflowEvent<"input_required", InputRequiredPayload<Artifact>>;

export type HumanResponseEvent = WorkflowEvent<"human_response", { response: string }>;

/**
 * Every event a workflow can see: the four system events plus the workflow's own kinds.
 */
export type WorkflowEvents<Args, Result, Custom extends AnyWorkflowEvent, Artifact = Result> =
  | StartEvent<Args>
  | StopEvent<Result>
  | InputRequiredEvent<Artifact>
  | HumanResponseEvent
  | Custom;

/** Events surfaced to the caller of a run. */
export type OutwardEvent<Result, Artifact = Result> = StopEvent<Result> | InputRequiredEvent<Artifact>;

const freezePayload = <Payload>(payload: Payload): Payload => {
  if (typeof payload === "object" && payload !== null) {
    Object.freeze(payload);
  }

  return payload;
};

export const createEvent = <Kind extends string, Payload>(
  kind: Kind,
  payload: Payload,
): WorkflowEvent<Kind, Payload> => Object.freeze({ kind, payload: freezePayload(payload) });

export const startEvent = <Args>(args: Args): StartEvent<Args> => createEvent(SystemEventKind.Start, args);

export const stopEvent = <Result>(result: Result): StopEvent<Result> =>
  createEvent(SystemEventKind.Stop, { result });

export const inputRequiredEvent = <Artifact>(prefix: string, result: Artifact): InputRequiredEvent<Artifact> =>
  createEvent(SystemEventKind.InputRequired, { prefix, result });

export const humanResponseEvent = (response: string): HumanResponseEvent =>
  createEvent(SystemEventKind.HumanResponse, { response });

export const isStopEvent = <Result>(event: AnyWorkflowEvent): event is StopEvent<Result> =>
  event.kind === SystemEventKind.Stop;

export const isInputRequiredEvent = <Artifact>(event: AnyWorkflowEvent): event is InputRequiredEvent<Artifact> =>
  event.kind === SystemEventKind.InputRequired;

export const isHumanResponseEvent = (event: AnyWorkflowEvent): event is HumanResponseEvent =>
  event.kind === SystemEventKind.HumanResponse;

export interface EventDefinition<Kind extends string, Payload> {
  readonly kind: Kind;
  create(payload: Payload): WorkflowEvent<Kind, Payload>;
  is(event: AnyWorkflowEvent): event is WorkflowEvent<Kind, Payload>;
}

export type EventOf<Definition> = Definition extends EventDefinition<infer Kind, infer Payload>
  ? WorkflowEvent<Kind, Payload>
  : never;

/**
 * Declares a workflow-specific event kind. When a schema is given, payloads are
 * validated on construction and a failure throws `WorkflowSchemaError`.
 */
export function defineEvent<Kind extends string, Payload>(
  kind: Kind,
  schema?: SchemaLike<Payload>,
): EventDefinition<Kind, Payload> {
  if (isSystemEventKind(kind)) {
    throw new WorkflowDefinitionError(`Event kind ${kind} is reserved`);
  }

  if (kind.trim() === "") {
    throw new WorkflowDefinitionError("Event kind cannot be empty");
  }

  return {
    kind,
    create(payload) {
      const validated = schema ? parseWithSchema(schema, payload, `event ${kind}`) : payload;
      return createEvent(kind, validated);
    },
    is(event): event is WorkflowEvent<Kind, Payload> {
      return event.kind === kind;
    },
  };
}
