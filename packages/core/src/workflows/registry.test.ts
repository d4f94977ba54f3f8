import { describe, expect, it } from "vitest";

import { WorkflowDefinitionError } from "./errors.js";
import type { AnyWorkflowEvent } from "./events.js";
import { StepRegistry } from "./registry.js";
import { createStep } from "./steps/step.js";

const step = (id: string, accepts: string[]) =>
  createStep<AnyWorkflowEvent, string>({ id, accepts, handler: () => undefined });

describe("StepRegistry", () => {
  it("routes a kind to every accepting step in registration order", () => {
    const registry = new StepRegistry<AnyWorkflowEvent, Record<string, unknown>>()
      .register(step("first", ["start", "field_query"]))
      .register(step("second", ["field_query"]))
      .freeze();

    expect(registry.resolve("field_query").map((entry) => entry.id)).toEqual(["first", "second"]);
    expect(registry.resolve("unknown")).toEqual([]);
    expect(registry.routingTable()).toEqual({ start: ["first"], field_query: ["first", "second"] });
  });

  it("rejects duplicate step ids", () => {
    const registry = new StepRegistry<AnyWorkflowEvent, Record<string, unknown>>().register(step("setup", ["start"]));

    expect(() => registry.register(step("setup", ["other"]))).toThrow(WorkflowDefinitionError);
  });

  it("allows a single human_response acceptor", () => {
    const registry = new StepRegistry<AnyWorkflowEvent, Record<string, unknown>>().register(
      step("feedback", ["human_response"]),
    );

    expect(() => registry.register(step("second-feedback", ["human_response"]))).toThrow(
      "Step second-feedback cannot accept human_response events: feedback already does",
    );
  });

  it("refuses steps for kinds that are never routed", () => {
    const registry = new StepRegistry<AnyWorkflowEvent, Record<string, unknown>>();

    expect(() => registry.register(step("stopper", ["stop"]))).toThrow(WorkflowDefinitionError);
    expect(() => registry.register(step("asker", ["input_required"]))).toThrow(WorkflowDefinitionError);
    expect(() => registry.register(step("idle", []))).toThrow(WorkflowDefinitionError);
  });

  it("needs a start acceptor to freeze and is read-only afterwards", () => {
    const empty = new StepRegistry<AnyWorkflowEvent, Record<string, unknown>>().register(step("orphan", ["other"]));
    expect(() => empty.freeze()).toThrow("A workflow needs at least one step accepting start events");

    const registry = new StepRegistry<AnyWorkflowEvent, Record<string, unknown>>().register(step("setup", ["start"])).freeze();
    expect(registry.isFrozen).toBe(true);
    expect(() => registry.register(step("late", ["other"]))).toThrow(WorkflowDefinitionError);
  });
});
