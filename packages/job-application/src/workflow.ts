import {
  createSilentLogger,
  createWorkflow,
  inputRequiredEvent,
  requireKinds,
  stopEvent,
  type Logger,
  type WorkflowTelemetryOption,
} from "@formpilot/core";
import { z } from "zod";

import {
  FeedbackEvent,
  FieldQueryEvent,
  FieldResponseEvent,
  GenerateQuestionsEvent,
  ParseFormEvent,
  type JobApplicationEvent,
} from "./events.js";
import {
  FEEDBACK_REQUEST,
  FORM_PARSE_INSTRUCTION,
  RESUME_PARSE_INSTRUCTION,
  feedbackVerdictPrompt,
  fieldQuestion,
  fillFormPrompt,
  integrateFeedbackPrompt,
  isAcceptVerdict,
  resumeQuery,
} from "./prompts.js";
import { JobApplicationError, type DocumentIndexHandle, type JobApplicationServices } from "./services.js";

export const jobApplicationArgsSchema = z.object({
  resume: z.string().trim().min(1, "resume path is required"),
  form: z.string().trim().min(1, "form path is required"),
});

export type JobApplicationArgs = z.infer<typeof jobApplicationArgsSchema>;

export type JobApplicationState = {
  resumeIndex: DocumentIndexHandle;
  fieldsToFill: string[];
  totalFields: number;
  filledForm: string;
};

export interface JobApplicationWorkflowOptions extends JobApplicationServices {
  logger?: Logger;
  timeoutMs?: number;
  telemetry?: WorkflowTelemetryOption;
}

export const JOB_APPLICATION_WORKFLOW_ID = "job-application";

/**
 * Fills a job application form from a resume, then loops on human feedback
 * until the reviewer accepts the result.
 *
 * start -> parse_form -> generate_questions -> field_query (one per field)
 * -> field_response (joined) -> input_required -> human_response
 * -> stop | feedback -> input_required ...
 */
export const createJobApplicationWorkflow = ({
  parser,
  fieldExtractor,
  indexer,
  completion,
  logger = createSilentLogger(),
  timeoutMs,
  telemetry,
}: JobApplicationWorkflowOptions) =>
  createWorkflow<JobApplicationArgs, string, JobApplicationEvent, JobApplicationState>({
    id: JOB_APPLICATION_WORKFLOW_ID,
    description: "Fill a job application form from a resume with human review",
    inputSchema: jobApplicationArgsSchema,
    required: ["resume", "form"],
    timeoutMs,
    logger,
    telemetry,
  })
    .step({
      id: "set-up",
      description: "Parse and index the resume",
      accepts: ["start"],
      emits: ["parse_form"],
      handler: async ({ event, ctx, signal }) => {
        const { resume, form } = event.payload;
        const namespace = `resume-${await parser.fingerprint(resume)}`;
        const handle = await indexer.index(namespace, async () => [
          { text: await parser.parse(resume, RESUME_PARSE_INSTRUCTION, { signal }), source: resume },
        ]);

        ctx.logger.info(handle.reused ? "Reusing stored resume index" : "Indexed resume", {
          namespace: handle.namespace,
        });
        ctx.store.set("resumeIndex", handle);

        return ParseFormEvent.create({ applicationForm: form });
      },
    })
    .step({
      id: "parse-form",
      description: "List the fields of the application form",
      accepts: ["parse_form"],
      emits: ["generate_questions"],
      handler: async ({ event, ctx, signal }) => {
        const formText = await parser.parse(event.payload.applicationForm, FORM_PARSE_INSTRUCTION, { signal });
        const fields = await fieldExtractor.extractFields(formText, { signal });

        if (fields.length === 0) {
          throw new JobApplicationError("No fillable fields found in the application form");
        }

        ctx.logger.info(`Found ${fields.length} fields to fill`);
        ctx.store.set("fieldsToFill", fields);

        return GenerateQuestionsEvent.create({});
      },
    })
    .step({
      id: "generate-questions",
      description: "Ask one question per form field",
      accepts: ["generate_questions"],
      emits: ["field_query"],
      handler: ({ ctx }) => {
        const fields = ctx.store.require("fieldsToFill");
        ctx.store.set("totalFields", fields.length);

        for (const field of fields) {
          ctx.sendEvent(FieldQueryEvent.create({ field, query: fieldQuestion(field) }));
        }
      },
    })
    .step({
      id: "ask-question",
      description: "Answer a field question from the resume index",
      accepts: ["field_query"],
      emits: ["field_response"],
      handler: async ({ event, ctx, signal }) => {
        const { field, query } = event.payload;
        const response = await indexer.query(ctx.store.require("resumeIndex"), resumeQuery(query), { signal });
        ctx.logger.debug("Answered field question", { field });

        return FieldResponseEvent.create({ field, response });
      },
    })
    .step({
      id: "fill-in-application",
      description: "Join every field answer into a filled form",
      accepts: ["field_response"],
      emits: ["input_required"],
      handler: async ({ event, ctx, signal }) => {
        const total = ctx.store.get("totalFields");
        const batch = ctx.collectEvents(
          event,
          total === undefined ? undefined : requireKinds(FieldResponseEvent.kind, total),
        );

        if (batch.status === "incomplete") {
          return;
        }

        const answers = batch.events.map(({ payload }) => payload);
        const filledForm = await completion.complete(fillFormPrompt(answers), { signal });
        ctx.store.set("filledForm", filledForm);
        ctx.logger.info("Form filled, requesting human feedback");

        return inputRequiredEvent(FEEDBACK_REQUEST, filledForm);
      },
    })
    .step({
      id: "get-feedback",
      description: "Decide whether the reviewer accepted the form",
      accepts: ["human_response"],
      emits: ["stop", "feedback"],
      handler: async ({ event, ctx, signal }) => {
        const { response } = event.payload;
        const verdict = await completion.complete(feedbackVerdictPrompt(response), { signal });
        ctx.logger.info("Feedback verdict", { verdict: verdict.trim() });

        if (isAcceptVerdict(verdict)) {
          return stopEvent(ctx.store.require("filledForm"));
        }

        return FeedbackEvent.create({ feedback: response });
      },
    })
    .step({
      id: "integrate-feedback",
      description: "Rewrite the filled form with the reviewer's feedback",
      accepts: ["feedback"],
      emits: ["input_required"],
      handler: async ({ event, ctx, signal }) => {
        const updated = await completion.complete(
          integrateFeedbackPrompt(ctx.store.require("filledForm"), event.payload.feedback),
          { signal },
        );
        ctx.store.set("filledForm", updated);

        return inputRequiredEvent(FEEDBACK_REQUEST, updated);
      },
    })
    .commit();

export type JobApplicationWorkflow = ReturnType<typeof createJobApplicationWorkflow>;
