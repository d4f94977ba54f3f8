import { WorkflowInjectionError, WorkflowValidationError } from "@formpilot/core";
import { HTTPException } from "hono/http-exception";

export function normalizeError(error: unknown) {
  if (error instanceof HTTPException) {
    return error;
  }

  if (error instanceof WorkflowValidationError) {
    return new HTTPException(400, { message: error.message, cause: error });
  }

  if (error instanceof WorkflowInjectionError) {
    return new HTTPException(409, { message: error.message, cause: error });
  }

  const message = error instanceof Error ? error.message : "Internal Server Error";

  return new HTTPException(500, { message, cause: error });
}

export const runNotFound = (runId: string) =>
  new HTTPException(404, { message: `Workflow run ${runId} not found` });

export const runFinished = (runId: string, status: string) =>
  new HTTPException(409, { message: `Workflow run ${runId} already finished with status ${status}` });
