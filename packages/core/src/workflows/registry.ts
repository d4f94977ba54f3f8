import { WorkflowDefinitionError } from "./errors.js";
import { SystemEventKind, type AnyWorkflowEvent } from "./events.js";
import type { StateShape } from "./types.js";
import type { WorkflowStep } from "./steps/step.js";

const NEVER_ROUTED = new Set<string>([SystemEventKind.Stop, SystemEventKind.InputRequired]);

/**
 * Static kind → steps routing table. Filled while the workflow is built,
 * frozen on commit, then shared read-only by every run.
 */
export class StepRegistry<E extends AnyWorkflowEvent, State extends StateShape> {
  private readonly steps = new Map<string, WorkflowStep<E, State>>();
  private readonly routes = new Map<string, WorkflowStep<E, State>[]>();
  private frozen = false;

  get isFrozen() {
    return this.frozen;
  }

  register(step: WorkflowStep<E, State>): this {
    if (this.frozen) {
      throw new WorkflowDefinitionError(`Cannot register step ${step.id} after the workflow was committed`);
    }

    if (this.steps.has(step.id)) {
      throw new WorkflowDefinitionError(`Duplicate workflow step id ${step.id}`);
    }

    if (step.accepts.size === 0) {
      throw new WorkflowDefinitionError(`Step ${step.id} must accept at least one event kind`);
    }

    for (const kind of step.accepts) {
      if (NEVER_ROUTED.has(kind)) {
        throw new WorkflowDefinitionError(`Step ${step.id} cannot accept ${kind} events`);
      }
    }

    if (step.accepts.has(SystemEventKind.HumanResponse)) {
      const existing = this.resolve(SystemEventKind.HumanResponse);
      const [owner] = existing;
      if (owner) {
        throw new WorkflowDefinitionError(
          `Step ${step.id} cannot accept human_response events: ${owner.id} already does`,
        );
      }
    }

    this.steps.set(step.id, step);
    for (const kind of step.accepts) {
      const route = this.routes.get(kind) ?? [];
      route.push(step);
      this.routes.set(kind, route);
    }

    return this;
  }

  freeze(): this {
    if (this.resolve(SystemEventKind.Start).length === 0) {
      throw new WorkflowDefinitionError("A workflow needs at least one step accepting start events");
    }

    this.frozen = true;
    return this;
  }

  /** Steps accepting `kind`, in registration order. */
  resolve(kind: string): readonly WorkflowStep<E, State>[] {
    return this.routes.get(kind) ?? [];
  }

  get(stepId: string): WorkflowStep<E, State> | undefined {
    return this.steps.get(stepId);
  }

  list(): WorkflowStep<E, State>[] {
    return Array.from(this.steps.values());
  }

  routingTable(): Record<string, string[]> {
    const table: Record<string, string[]> = {};
    for (const [kind, steps] of this.routes) {
      table[kind] = steps.map((step) => step.id);
    }

    return table;
  }
}
