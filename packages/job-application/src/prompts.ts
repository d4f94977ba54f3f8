export const RESUME_PARSE_INSTRUCTION =
  "This is a resume, gather related facts together and format it as bullet points with headers";

export const FORM_PARSE_INSTRUCTION =
  "This is a job application form. Create a list of all the fields that need to be filled in. Return a bulleted list of the fields ONLY.";

export const FEEDBACK_REQUEST = "How does this look? Give me any feedback you have on any of the answers.";

export const RESUME_QUERY_PREFIX = "This is a question about the specific resume we have in our database: ";

/** Verdict word meaning the reviewer accepted the form. */
export const ACCEPT_VERDICT = "OKAY";

export const fieldQuestion = (field: string) =>
  `How would you answer this question about the candidate? <field>${field}</field>`;

export const resumeQuery = (question: string) => `${RESUME_QUERY_PREFIX}${question}`;

export const formFieldsPrompt = (formText: string) =>
  `This is a parsed form. Convert it into a JSON object containing only the list of fields to be filled in, in the form { fields: [...] }. <form>${formText}</form>. Return JSON ONLY, no markdown.`;

export const documentParsePrompt = (instruction: string, text: string) =>
  `${instruction}\n<document>\n${text}\n</document>`;

export interface FieldAnswer {
  field: string;
  response: string;
}

export const formatResponses = (answers: readonly FieldAnswer[]) =>
  answers.map(({ field, response }) => `Field: ${field}\nResponse: ${response}`).join("\n");

export const fillFormPrompt = (answers: readonly FieldAnswer[]) =>
  [
    "You are given a list of fields in an application form and responses to",
    "questions about those fields from a resume. Combine the two into a list of",
    "fields and succinct, factual answers to fill in those fields.",
    "",
    "<responses>",
    formatResponses(answers),
    "</responses>",
  ].join("\n");

export const feedbackVerdictPrompt = (feedback: string) =>
  [
    "You have received some human feedback on the form-filling task you've done.",
    "Does everything look good, or is there more work to be done?",
    "<feedback>",
    feedback,
    "</feedback>",
    `If everything is fine, respond with just the word '${ACCEPT_VERDICT}'.`,
    "If there's any other feedback, respond with just the word 'FEEDBACK'.",
  ].join("\n");

export const integrateFeedbackPrompt = (filledForm: string, feedback: string) =>
  [
    "You have received some human feedback on the form-filling task you've done.",
    "Please integrate the feedback into the form.",
    `<form>${filledForm}</form>`,
    `<feedback>${feedback}</feedback>`,
    "Return the updated form.",
  ].join("\n");

export const isAcceptVerdict = (verdict: string) => verdict.trim().toUpperCase() === ACCEPT_VERDICT;
