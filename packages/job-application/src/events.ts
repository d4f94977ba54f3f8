import { defineEvent, type EventOf } from "@formpilot/core";
import { z } from "zod";

export const ParseFormEvent = defineEvent(
  "parse_form",
  z.object({ applicationForm: z.string().min(1) }),
);

export const GenerateQuestionsEvent = defineEvent("generate_questions", z.object({}));

export const FieldQueryEvent = defineEvent(
  "field_query",
  z.object({ field: z.string().min(1), query: z.string().min(1) }),
);

export const FieldResponseEvent = defineEvent(
  "field_response",
  z.object({ field: z.string(), response: z.string() }),
);

export const FeedbackEvent = defineEvent("feedback", z.object({ feedback: z.string() }));

export type JobApplicationEvent =
  | EventOf<typeof ParseFormEvent>
  | EventOf<typeof GenerateQuestionsEvent>
  | EventOf<typeof FieldQueryEvent>
  | EventOf<typeof FieldResponseEvent>
  | EventOf<typeof FeedbackEvent>;
