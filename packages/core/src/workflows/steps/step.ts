import { WorkflowExecutionError } from "../errors.js";
import type { AnyWorkflowEvent } from "../events.js";
import type {
  MaybePromise,
  StateShape,
  StepHandlerArgs,
  WorkflowStepConfig,
  WorkflowStepInspection,
} from "../types.js";

type ErasedHandler<E extends AnyWorkflowEvent, State extends StateShape> = (
  args: StepHandlerArgs<E, E, State>,
) => MaybePromise<E | void>;

export class WorkflowStep<
  E extends AnyWorkflowEvent = AnyWorkflowEvent,
  State extends StateShape = StateShape,
> {
  readonly id: string;
  readonly description?: string;
  readonly accepts: ReadonlySet<string>;
  readonly emits?: ReadonlySet<string>;
  private readonly handler: ErasedHandler<E, State>;

  private constructor(
    id: string,
    description: string | undefined,
    accepts: ReadonlySet<string>,
    emits: ReadonlySet<string> | undefined,
    handler: ErasedHandler<E, State>,
  ) {
    this.id = id;
    this.description = description;
    this.accepts = accepts;
    this.emits = emits;
    this.handler = handler;
  }

  static from<E extends AnyWorkflowEvent, Accepts extends E["kind"], State extends StateShape>(
    config: WorkflowStepConfig<E, Accepts, State>,
  ): WorkflowStep<E, State> {
    const accepts = new Set<string>(config.accepts);
    const isAccepted = (event: E): event is Extract<E, { kind: Accepts }> => accepts.has(event.kind);

    return new WorkflowStep<E, State>(
      config.id,
      config.description,
      accepts,
      config.emits ? new Set<string>(config.emits) : undefined,
      (args) => {
        const { event } = args;
        if (!isAccepted(event)) {
          throw new WorkflowExecutionError(`Step ${config.id} does not accept ${event.kind} events`);
        }

        return config.handler({ ...args, event });
      },
    );
  }

  mayEmit(kind: string): boolean {
    return this.emits === undefined || this.emits.has(kind);
  }

  async execute(args: StepHandlerArgs<E, E, State>): Promise<E | undefined> {
    const produced = await this.handler(args);
    if (produced === undefined) {
      return undefined;
    }

    return produced;
  }

  inspect(): WorkflowStepInspection {
    return {
      id: this.id,
      description: this.description,
      accepts: Array.from(this.accepts),
      emits: this.emits ? Array.from(this.emits) : undefined,
    };
  }
}

export const createStep = <E extends AnyWorkflowEvent, Accepts extends E["kind"], State extends StateShape = StateShape>(
  config: WorkflowStepConfig<E, Accepts, State>,
): WorkflowStep<E, State> => WorkflowStep.from(config);
