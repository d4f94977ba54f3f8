import { describe, expect, it } from "vitest";

import { EventBarrier, requireKinds } from "./barrier.js";
import { createEvent, type WorkflowEvent } from "./events.js";

type TestEvent = WorkflowEvent<"answer", number> | WorkflowEvent<"note", string>;

const answer = (value: number): TestEvent => createEvent("answer", value);
const note = (value: string): TestEvent => createEvent("note", value);

describe("EventBarrier", () => {
  it("stays incomplete until k events of the required kind arrived", () => {
    const barrier = new EventBarrier<TestEvent>();
    const required = requireKinds("answer", 3);

    expect(barrier.collect("join", answer(1), required)).toEqual({ status: "incomplete" });
    expect(barrier.collect("join", answer(2), required)).toEqual({ status: "incomplete" });

    const released = barrier.collect("join", answer(3), required);

    expect(released.status).toBe("batch");
    if (released.status === "batch") {
      expect(released.events.map((event) => event.payload)).toEqual([1, 2, 3]);
    }
    expect(barrier.buffered("join", "answer")).toBe(0);
  });

  it("releases exactly one batch per round when 2k events arrive", () => {
    const barrier = new EventBarrier<TestEvent>();
    const required = requireKinds("answer", 2);
    const statuses = [1, 2, 3, 4].map((value) => barrier.collect("join", answer(value), required).status);

    expect(statuses).toEqual(["incomplete", "batch", "incomplete", "batch"]);
  });

  it("buffers without releasing while the expected count is unknown", () => {
    const barrier = new EventBarrier<TestEvent>();

    expect(barrier.collect("join", answer(1), undefined)).toEqual({ status: "incomplete" });
    expect(barrier.collect("join", answer(2), [])).toEqual({ status: "incomplete" });
    expect(barrier.buffered("join", "answer")).toBe(2);

    const released = barrier.collect("join", answer(3), requireKinds("answer", 2));
    expect(released.status).toBe("batch");
    if (released.status === "batch") {
      expect(released.events.map((event) => event.payload)).toEqual([1, 2]);
    }
    expect(barrier.buffered("join", "answer")).toBe(1);
  });

  it("orders mixed batches by the required list, each kind in arrival order", () => {
    const barrier = new EventBarrier<TestEvent>();
    const required = ["note", "answer", "answer"] as const;

    barrier.collect("join", answer(10), required);
    barrier.collect("join", answer(20), required);
    const released = barrier.collect("join", note("done"), required);

    expect(released.status).toBe("batch");
    if (released.status === "batch") {
      expect(released.events.map((event) => event.payload)).toEqual(["done", 10, 20]);
    }
  });

  it("drops kinds the required list does not name", () => {
    const barrier = new EventBarrier<TestEvent>();
    const required = requireKinds("answer", 2);

    expect(barrier.collect("join", note("stray"), required)).toEqual({ status: "incomplete" });
    expect(barrier.collect("join", answer(1), required)).toEqual({ status: "incomplete" });
    expect(barrier.collect("join", note("stray"), required)).toEqual({ status: "incomplete" });
    expect(barrier.buffered("join", "note")).toBe(0);

    const released = barrier.collect("join", answer(2), required);
    expect(released.status).toBe("batch");
    if (released.status === "batch") {
      expect(released.events.map((event) => event.payload)).toEqual([1, 2]);
    }
  });

  it("keeps buffers of different steps apart", () => {
    const barrier = new EventBarrier<TestEvent>();

    barrier.collect("left", answer(1), requireKinds("answer", 2));
    const right = barrier.collect("right", answer(2), requireKinds("answer", 2));

    expect(right).toEqual({ status: "incomplete" });
    expect(barrier.buffered("left", "answer")).toBe(1);
    expect(barrier.buffered("right", "answer")).toBe(1);
  });

  it("drops everything once released", () => {
    const barrier = new EventBarrier<TestEvent>();
    barrier.collect("join", answer(1), undefined);
    barrier.release();

    expect(barrier.buffered("join", "answer")).toBe(0);
    expect(barrier.collect("join", answer(2), requireKinds("answer", 1))).toEqual({ status: "incomplete" });
  });
});

describe("requireKinds", () => {
  it("repeats the kind count times", () => {
    expect(requireKinds("answer", 3)).toEqual(["answer", "answer", "answer"]);
    expect(requireKinds("answer", 0)).toEqual([]);
  });
});
