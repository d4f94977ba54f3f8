import { serve } from "@hono/node-server";
import {
  createSilentLogger,
  isInputRequiredEvent,
  type Logger,
  type OutwardEvent,
  type WorkflowRunStatus,
} from "@formpilot/core";
import { Hono } from "hono";
import type { Context } from "hono";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import { z } from "zod";

import { normalizeError, runFinished, runNotFound } from "./formServer/errors.js";
import { removeFiles, saveUploads } from "./formServer/uploads.js";
import type {
  ActiveRun,
  FormServerConfig,
  JobApplicationRun,
  ListenOptions,
  RunResponse,
} from "./formServer/types.js";

const FEEDBACK_MESSAGE = "Please provide your feedback";
const COMPLETED_MESSAGE = "Application form completed";
/** Finished runs remembered so late requests get their final status. */
const FINISHED_RUN_LIMIT = 1_000;

const respondSchema = z.object({
  feedback: z.string().trim().min(1, "feedback must not be empty"),
});

export class FormServer {
  readonly app: Hono;
  private readonly workflow: FormServerConfig["workflow"];
  private readonly uploadDir: string;
  private readonly logger: Logger;
  private readonly runs = new Map<string, ActiveRun>();
  private readonly finished = new Map<string, WorkflowRunStatus>();

  constructor(config: FormServerConfig) {
    this.workflow = config.workflow;
    this.uploadDir = config.uploadDir;
    this.logger = config.logger ?? createSilentLogger();
    this.app = new Hono();

    this.app.use("/api/*", cors({ origin: config.corsOrigins ?? "*" }));

    this.app.onError((err, c) => {
      const normalized = normalizeError(err);
      if (normalized.status >= 500) {
        this.logger.error("Unhandled server error", { error: err });
      }

      return c.json({ error: normalized.message }, normalized.status);
    });

    this.app.notFound((c) => c.json({ error: "Not Found" }, 404));

    this.registerRoutes();
  }

  /** Runs waiting for feedback or still in progress. */
  get activeRuns(): number {
    return this.runs.size;
  }

  listen({ port = 8000, hostname = "0.0.0.0", signal }: ListenOptions = {}) {
    const server = serve({
      fetch: this.app.fetch,
      port,
      hostname,
    });

    this.logger.info(`Listening on http://${hostname}:${port}`);

    if (signal) {
      const closeServer = () => {
        server.close();
      };

      if (signal.aborted) {
        closeServer();
      } else {
        signal.addEventListener("abort", closeServer, { once: true });
      }
    }

    return server;
  }

  /** Cancels every active run and deletes its uploaded files. */
  async cleanup(): Promise<void> {
    const entries = Array.from(this.runs.entries());
    for (const [, entry] of entries) {
      entry.run.cancel("Server shutting down");
    }

    await Promise.all(entries.map(([runId]) => this.release(runId)));
  }

  private registerRoutes() {
    this.app.post("/api/upload", async (c) => {
      const body = await c.req.parseBody();
      const files = await saveUploads(body, this.uploadDir);
      this.logger.info("Saved uploaded documents", { resume: files.resume, form: files.form });

      let run: JobApplicationRun;
      try {
        run = this.workflow.run({ resume: files.resume, form: files.form });
      } catch (error) {
        await removeFiles([files.resume, files.form]);
        throw error;
      }

      const entry: ActiveRun = { run, events: run.events(), files: [files.resume, files.form] };
      this.runs.set(run.runId, entry);
      void run
        .result()
        .catch((error: unknown) => {
          this.logger.warn("Workflow run ended without a result", { runId: run.runId, error });
        })
        .finally(() => this.release(run.runId));

      return c.json(await this.nextResponse(entry));
    });

    this.app.post("/api/workflows/:runId/respond", async (c) => {
      const runId = c.req.param("runId");
      const status = this.finished.get(runId);
      if (status) {
        throw runFinished(runId, status);
      }

      const entry = this.getRunOrThrow(c);
      const { feedback } = await this.parseRespondBody(c);

      entry.run.resumeWithHumanInput({ response: feedback });
      this.logger.info("Feedback received", { runId: entry.run.runId });

      return c.json(await this.nextResponse(entry));
    });

    this.app.get("/api/workflows/:runId", (c) => {
      const runId = c.req.param("runId");
      const status = this.finished.get(runId);
      if (status) {
        return c.json({ workflow_id: runId, status });
      }

      const { run } = this.getRunOrThrow(c);
      const snapshot = run.snapshot();

      return c.json({
        workflow_id: snapshot.runId,
        status: snapshot.status,
        started_at: snapshot.startedAt.toISOString(),
        active_steps: snapshot.activeSteps,
        pending_events: snapshot.pendingEvents,
      });
    });
  }

  private async nextResponse(entry: ActiveRun): Promise<RunResponse> {
    const next = await entry.events.next();
    if (next.done) {
      throw new HTTPException(500, { message: `Workflow run ${entry.run.runId} ended without a result` });
    }

    return this.describe(entry.run.runId, next.value);
  }

  private describe(runId: string, event: OutwardEvent<string>): RunResponse {
    if (isInputRequiredEvent<string>(event)) {
      return {
        message: FEEDBACK_MESSAGE,
        workflow_id: runId,
        status: "suspended",
        filled_form: event.payload.result,
        feedback_prompt: event.payload.prefix,
      };
    }

    return {
      message: COMPLETED_MESSAGE,
      workflow_id: runId,
      status: "completed",
      filled_form: event.payload.result,
    };
  }

  private getRunOrThrow(c: Context) {
    const runId = c.req.param("runId");
    const entry = this.runs.get(runId);

    if (!entry) {
      throw runNotFound(runId);
    }

    return entry;
  }

  private async parseRespondBody(c: Context) {
    let json: unknown;

    try {
      json = await c.req.json();
    } catch {
      throw new HTTPException(400, { message: "Invalid JSON payload" });
    }

    const result = respondSchema.safeParse(json);
    if (!result.success) {
      throw new HTTPException(400, { message: "Respond payload must include a non-empty feedback string" });
    }

    return result.data;
  }

  private async release(runId: string) {
    const entry = this.runs.get(runId);
    if (!entry) {
      return;
    }

    this.runs.delete(runId);
    this.rememberFinished(runId, entry.run.status);
    try {
      await removeFiles(entry.files);
    } catch (error) {
      this.logger.error("Failed to remove uploaded files", { runId, error });
    }
  }

  private rememberFinished(runId: string, status: WorkflowRunStatus) {
    this.finished.set(runId, status);
    if (this.finished.size > FINISHED_RUN_LIMIT) {
      const [oldest] = this.finished.keys();
      if (oldest !== undefined) {
        this.finished.delete(oldest);
      }
    }
  }
}

export function createFormServer(config: FormServerConfig) {
  return new FormServer(config);
}

export type { FormServerConfig, ListenOptions, RunResponse } from "./formServer/types.js";
