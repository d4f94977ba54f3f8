import { describe, expect, it, vi } from "vitest";

import { createCompletionFieldExtractor, parseFieldList, stripCodeFence } from "./fieldExtractor.js";
import { formFieldsPrompt } from "./prompts.js";
import { JobApplicationError } from "./services.js";

describe("stripCodeFence", () => {
  it("unwraps a fenced json block", () => {
    expect(stripCodeFence('```json\n{"fields": ["Name"]}\n```')).toBe('{"fields": ["Name"]}');
  });

  it("leaves unfenced text alone apart from trimming", () => {
    expect(stripCodeFence('  {"fields": []}\n')).toBe('{"fields": []}');
  });
});

describe("parseFieldList", () => {
  it("trims, drops blanks and removes duplicates in order", () => {
    expect(parseFieldList('{"fields": [" Name ", "Email", "Name", ""]}')).toEqual(["Name", "Email"]);
  });

  it("rejects text that is not json", () => {
    expect(() => parseFieldList("Name, Email")).toThrow(JobApplicationError);
    expect(() => parseFieldList("Name, Email")).toThrow("Form field list is not valid JSON");
  });

  it("rejects json of the wrong shape", () => {
    expect(() => parseFieldList('{"items": ["Name"]}')).toThrow(
      "Form field list must look like { fields: string[] }",
    );
  });
});

describe("createCompletionFieldExtractor", () => {
  it("asks the completion service for the field list", async () => {
    const complete = vi.fn(async () => '```json\n{"fields": ["Name", "Phone"]}\n```');
    const extractor = createCompletionFieldExtractor({ completion: { complete } });
    const controller = new AbortController();

    const fields = await extractor.extractFields("- Name\n- Phone", { signal: controller.signal });

    expect(fields).toEqual(["Name", "Phone"]);
    expect(complete).toHaveBeenCalledWith(formFieldsPrompt("- Name\n- Phone"), { signal: controller.signal });
  });
});
