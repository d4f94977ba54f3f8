import type { Logger, OutwardEvent } from "@formpilot/core";
import type { JobApplicationWorkflow } from "@formpilot/job-application";

export type JobApplicationRun = ReturnType<JobApplicationWorkflow["run"]>;

export interface FormServerConfig {
  workflow: JobApplicationWorkflow;
  /** Directory uploaded documents are written to. Created on demand. */
  uploadDir: string;
  logger?: Logger;
  /** Origins allowed by CORS; every origin when omitted. */
  corsOrigins?: string[];
}

export interface ListenOptions {
  port?: number;
  hostname?: string;
  signal?: AbortSignal;
}

export interface ActiveRun {
  run: JobApplicationRun;
  events: AsyncIterableIterator<OutwardEvent<string>>;
  files: string[];
}

export interface UploadedDocuments {
  resume: string;
  form: string;
}

export type RunResponse =
  | {
      message: string;
      workflow_id: string;
      status: "suspended";
      filled_form: string;
      feedback_prompt: string;
    }
  | {
      message: string;
      workflow_id: string;
      status: "completed";
      filled_form: string;
    };
