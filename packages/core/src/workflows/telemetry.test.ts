import { SpanStatusCode, trace } from "@opentelemetry/api";
import { BasicTracerProvider, InMemorySpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { afterAll, afterEach, beforeAll, describe, expect, it } from "vitest";
import { z } from "zod";

import { inputRequiredEvent, stopEvent } from "./events.js";
import { resolveWorkflowTelemetryConfig } from "./telemetry.js";
import { createWorkflow } from "./workflowBuilder.js";

const exporter = new InMemorySpanExporter();

const argsSchema = z.object({ topic: z.string() });
type Args = z.infer<typeof argsSchema>;

type State = {
  draft: string;
};

const createTracedWorkflow = () =>
  createWorkflow<Args, string, never, State>({
    id: "traced-review",
    inputSchema: argsSchema,
    timeoutMs: 1_000,
    telemetry: { metadata: { team: "forms" } },
  })
    .step({
      id: "draft",
      description: "Write a first draft",
      accepts: ["start"],
      handler: ({ event, ctx }) => {
        ctx.store.set("draft", event.payload.topic);
        return inputRequiredEvent("Looks right?", event.payload.topic);
      },
    })
    .step({
      id: "review",
      accepts: ["human_response"],
      handler: ({ event, ctx }) => {
        if (event.payload.response === "fail") {
          throw new Error("reviewer unavailable");
        }
        const draft = ctx.store.require("draft");
        if (event.payload.response === "ok") {
          return stopEvent(draft);
        }
        const revised = `${draft} (${event.payload.response})`;
        ctx.store.set("draft", revised);
        return inputRequiredEvent("Looks right?", revised);
      },
    })
    .commit();

const answerAll = async (run: ReturnType<ReturnType<typeof createTracedWorkflow>["run"]>, replies: string[]) => {
  const pending = [...replies];
  const events = run.events();
  for (let next = await events.next(); !next.done; next = await events.next()) {
    if (next.value.kind === "input_required") {
      run.resumeWithHumanInput({ response: pending.shift() ?? "ok" });
    }
  }
};

describe("workflow telemetry", () => {
  beforeAll(() => {
    trace.setGlobalTracerProvider(new BasicTracerProvider({ spanProcessors: [new SimpleSpanProcessor(exporter)] }));
  });

  afterEach(() => {
    exporter.reset();
  });

  afterAll(() => {
    trace.disable();
  });

  it("records one root span and one child span per step execution", async () => {
    const run = createTracedWorkflow().run({ topic: "cover letter" });

    await answerAll(run, ["shorter", "ok"]);
    await expect(run.result()).resolves.toBe("cover letter (shorter)");

    const spans = exporter.getFinishedSpans();
    const roots = spans.filter((span) => span.name === "traced-review");
    expect(roots).toHaveLength(1);
    const [root] = roots;
    if (!root) {
      return;
    }

    const steps = spans.filter((span) => span !== root);
    expect(steps.map((span) => span.name)).toEqual([
      "traced-review.step.draft",
      "traced-review.step.review",
      "traced-review.step.review",
    ]);
    for (const step of steps) {
      expect(step.parentSpanId).toBe(root.spanContext().spanId);
      expect(step.spanContext().traceId).toBe(root.spanContext().traceId);
      expect(step.status.code).toBe(SpanStatusCode.OK);
    }
    expect(steps[0]?.attributes["formpilot.workflow.step.description"]).toBe("Write a first draft");
    expect(steps[1]?.attributes["formpilot.workflow.step.event_kind"]).toBe("human_response");

    expect(root.events.map((event) => event.name)).toEqual([
      "workflow.input_required",
      "workflow.human_response",
      "workflow.input_required",
      "workflow.human_response",
    ]);
    expect(root.events[0]?.attributes?.prefix).toBe("Looks right?");
    expect(root.status.code).toBe(SpanStatusCode.OK);
    expect(root.attributes).toMatchObject({
      "formpilot.workflow.id": "traced-review",
      "formpilot.workflow.run_id": run.runId,
      "formpilot.workflow.status": "completed",
      "formpilot.workflow.metadata.team": "forms",
      "formpilot.workflow.input": JSON.stringify({ topic: "cover letter" }),
      "formpilot.workflow.output": "cover letter (shorter)",
    });
  });

  it("marks the failing step and the run as errors", async () => {
    const run = createTracedWorkflow().run({ topic: "cover letter" });

    await expect(answerAll(run, ["fail"])).rejects.toThrow("Step review failed: reviewer unavailable");

    const spans = exporter.getFinishedSpans();
    const review = spans.find((span) => span.name === "traced-review.step.review");
    const root = spans.find((span) => span.name === "traced-review");

    expect(review?.status).toEqual({ code: SpanStatusCode.ERROR, message: "reviewer unavailable" });
    expect(root?.status).toEqual({
      code: SpanStatusCode.ERROR,
      message: "Step review failed: reviewer unavailable",
    });
    expect(root?.attributes["formpilot.workflow.status"]).toBe("failed");
  });

  it("records nothing when a run turns telemetry off", async () => {
    const run = createTracedWorkflow().run({ topic: "cover letter" }, { telemetry: false });

    await answerAll(run, ["ok"]);
    await expect(run.result()).resolves.toBe("cover letter");

    expect(exporter.getFinishedSpans()).toEqual([]);
  });
});

describe("resolveWorkflowTelemetryConfig", () => {
  it("stays off unless the workflow or the run enables it", () => {
    expect(resolveWorkflowTelemetryConfig({ workflowId: "w" })).toBeUndefined();
    expect(resolveWorkflowTelemetryConfig({ workflowId: "w", baseOption: false })).toBeUndefined();
    expect(resolveWorkflowTelemetryConfig({ workflowId: "w", baseOption: true, overrideOption: false })).toBeUndefined();
  });

  it("lets run options override the workflow defaults", () => {
    expect(
      resolveWorkflowTelemetryConfig({
        workflowId: "w",
        baseOption: { metadata: { team: "forms" }, recordInputs: false },
        overrideOption: { traceName: "nightly", metadata: { batch: 3 } },
      }),
    ).toEqual({
      traceName: "nightly",
      metadata: { team: "forms", batch: 3 },
      recordInputs: false,
      recordOutputs: true,
    });

    expect(resolveWorkflowTelemetryConfig({ workflowId: "w", overrideOption: true })).toEqual({
      traceName: "w",
      metadata: undefined,
      recordInputs: true,
      recordOutputs: true,
    });
  });
});
