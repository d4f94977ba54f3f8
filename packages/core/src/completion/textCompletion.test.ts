import { beforeEach, describe, expect, it, vi } from "vitest";

const generateText = vi.hoisted(() =>
  vi.fn(async (_options: { prompt: string; system?: string; abortSignal?: AbortSignal }) => ({
    text: "Ada Lovelace",
  })),
);

vi.mock("ai", () => ({ generateText }));

import { createTextCompletion } from "./textCompletion.js";

describe("createTextCompletion", () => {
  beforeEach(() => {
    generateText.mockClear();
  });

  it("returns the generated text for a prompt", async () => {
    const completion = createTextCompletion({ model: "test-model", system: "Answer briefly." });
    const controller = new AbortController();

    await expect(completion.complete("Who wrote the first program?", { signal: controller.signal })).resolves.toBe(
      "Ada Lovelace",
    );
    expect(generateText).toHaveBeenCalledTimes(1);
    expect(generateText).toHaveBeenCalledWith(
      expect.objectContaining({
        model: "test-model",
        system: "Answer briefly.",
        prompt: "Who wrote the first program?",
        abortSignal: controller.signal,
      }),
    );
  });

  it("propagates provider failures", async () => {
    generateText.mockRejectedValueOnce(new Error("rate limited"));
    const completion = createTextCompletion({ model: "test-model" });

    await expect(completion.complete("hello")).rejects.toThrow("rate limited");
  });
});
