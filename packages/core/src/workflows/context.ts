import { WorkflowExecutionError } from "./errors.js";
import type { AnyWorkflowEvent } from "./events.js";
import type { ContextStore, StateKey, StateShape } from "./types.js";

class KeyValueStore<State extends StateShape> implements ContextStore<State> {
  private values: Partial<State> = {};

  get<K extends StateKey<State>>(key: K): State[K] | undefined {
    return this.values[key];
  }

  require<K extends StateKey<State>>(key: K): State[K] {
    const value = this.values[key];
    if (value === undefined) {
      throw new WorkflowExecutionError(`Context key ${key} has not been set`);
    }

    return value;
  }

  set<K extends StateKey<State>>(key: K, value: State[K]): void {
    this.values[key] = value;
  }

  has(key: StateKey<State>): boolean {
    return this.values[key] !== undefined;
  }

  snapshot(): Readonly<Partial<State>> {
    return Object.freeze({ ...this.values });
  }

  clear() {
    this.values = {};
  }
}

/**
 * Per-run state: the key/value store and the FIFO queue of events waiting for
 * dispatch. Barrier buffers live in {@link EventBarrier}, owned by the same run.
 */
export class WorkflowContext<E extends AnyWorkflowEvent, State extends StateShape> {
  readonly store = new KeyValueStore<State>();
  private readonly pending: E[] = [];
  private released = false;

  get isReleased() {
    return this.released;
  }

  get pendingCount() {
    return this.pending.length;
  }

  enqueue(event: E) {
    if (this.released) {
      return;
    }

    this.pending.push(event);
  }

  dequeue(): E | undefined {
    return this.pending.shift();
  }

  release() {
    this.released = true;
    this.pending.length = 0;
    this.store.clear();
  }
}
