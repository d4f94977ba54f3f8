import { randomUUID } from "node:crypto";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { extname, join } from "node:path";

import { SUPPORTED_DOCUMENT_EXTENSIONS, isSupportedDocument } from "@formpilot/job-application";
import { HTTPException } from "hono/http-exception";

import type { UploadedDocuments } from "./types.js";

type UploadField = "resume" | "application_form";

const FILE_PREFIX: Record<UploadField, string> = {
  resume: "resume",
  application_form: "job_application_form",
};

type BodyValue = string | File | (string | File)[] | undefined;

const pickFile = (body: Record<string, BodyValue>, field: UploadField): File => {
  const value = body[field];
  if (!(value instanceof File)) {
    throw new HTTPException(400, { message: `Multipart field ${field} must be a single file` });
  }

  if (!isSupportedDocument(value.name)) {
    throw new HTTPException(400, {
      message: `Unsupported ${field} file ${value.name}: expected one of ${SUPPORTED_DOCUMENT_EXTENSIONS.join(", ")}`,
    });
  }

  return value;
};

export const uploadFileName = (field: UploadField, originalName: string, timestamp = Date.now()) =>
  `${FILE_PREFIX[field]}_${timestamp}_${randomUUID().slice(0, 8)}${extname(originalName).toLowerCase()}`;

export async function removeFiles(paths: readonly string[]) {
  await Promise.all(paths.map((path) => rm(path, { force: true })));
}

const writeUpload = async (uploadDir: string, field: UploadField, file: File) => {
  const path = join(uploadDir, uploadFileName(field, file.name));
  await writeFile(path, Buffer.from(await file.arrayBuffer()));
  return path;
};

/** Writes both uploaded documents; on failure nothing is left behind. */
export async function saveUploads(
  body: Record<string, BodyValue>,
  uploadDir: string,
): Promise<UploadedDocuments> {
  const resume = pickFile(body, "resume");
  const form = pickFile(body, "application_form");

  await mkdir(uploadDir, { recursive: true });

  const written: string[] = [];
  try {
    const resumePath = await writeUpload(uploadDir, "resume", resume);
    written.push(resumePath);
    const formPath = await writeUpload(uploadDir, "application_form", form);
    written.push(formPath);

    return { resume: resumePath, form: formPath };
  } catch (error) {
    await removeFiles(written);
    throw error;
  }
}
