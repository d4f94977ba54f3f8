import type { AnyWorkflowEvent } from "./events.js";
import type { BarrierResult } from "./types.js";

/**
 * Fan-in collector. Each step owns one buffer per event kind. `collect` never
 * awaits, so append, check and drain happen as one turn of the event loop and
 * two concurrent producers can never release the same batch twice.
 *
 * While the required list is unknown (undefined or empty) every event is
 * kept. Once it is known, events of kinds it does not name are dropped.
 */
export class EventBarrier<E extends AnyWorkflowEvent> {
  private readonly buffers = new Map<string, Map<string, E[]>>();
  private released = false;

  collect<K extends E["kind"]>(
    stepId: string,
    event: E,
    required: readonly K[] | undefined,
  ): BarrierResult<Extract<E, { kind: K }>> {
    if (this.released) {
      return { status: "incomplete" };
    }

    const buffers = this.buffersFor(stepId);
    const countKnown = required !== undefined && required.length > 0;
    if (countKnown && !required.some((kind) => kind === event.kind)) {
      return { status: "incomplete" };
    }

    const arrived = buffers.get(event.kind) ?? [];
    arrived.push(event);
    buffers.set(event.kind, arrived);

    if (!countKnown) {
      return { status: "incomplete" };
    }

    const counts = new Map<string, number>();
    for (const kind of required) {
      counts.set(kind, (counts.get(kind) ?? 0) + 1);
    }

    for (const [kind, count] of counts) {
      if ((buffers.get(kind)?.length ?? 0) < count) {
        return { status: "incomplete" };
      }
    }

    const wanted = new Set<string>(required);
    const isWanted = (candidate: E): candidate is Extract<E, { kind: K }> => wanted.has(candidate.kind);
    const events: Array<Extract<E, { kind: K }>> = [];

    for (const kind of required) {
      const next = buffers.get(kind)?.shift();
      if (next !== undefined && isWanted(next)) {
        events.push(next);
      }
    }

    return { status: "batch", events };
  }

  /** Number of buffered events of `kind` for `stepId`. */
  buffered(stepId: string, kind: string): number {
    return this.buffers.get(stepId)?.get(kind)?.length ?? 0;
  }

  release() {
    this.released = true;
    this.buffers.clear();
  }

  private buffersFor(stepId: string) {
    let buffers = this.buffers.get(stepId);
    if (!buffers) {
      buffers = new Map<string, E[]>();
      this.buffers.set(stepId, buffers);
    }

    return buffers;
  }
}

/** Builds a required-kinds list holding `kind` `count` times. */
export const requireKinds = <K extends string>(kind: K, count: number): K[] =>
  Array.from({ length: Math.max(0, count) }, () => kind);
