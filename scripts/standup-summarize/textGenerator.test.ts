import { describe, it, expect, vi } from "vitest";

const { createMock, OpenAIMock } = vi.hoisted(() => {
  const createMock = vi.fn();
  const OpenAIMock = vi.fn(function () {
    return { chat: { completions: { create: createMock } } };
  });
  return { createMock, OpenAIMock };
});

vi.mock("openai", () => ({ default: OpenAIMock }));

import { OpenAITextGenerator } from "./textGenerator";

describe("OpenAITextGenerator", () => {
  it("should point the client at the configured endpoint without retries", () => {
    new OpenAITextGenerator({
      apiKey: "test-secret",
      baseURL: "http://localhost:11434/v1",
    });

    expect(OpenAIMock).toHaveBeenCalledWith({
      apiKey: "test-secret",
      baseURL: "http://localhost:11434/v1",
      maxRetries: 0,
    });
  });

  it("should send the prompt as a single user message", async () => {
    createMock.mockResolvedValue({
      choices: [{ message: { content: "- Shipped the release" } }],
    });
    const generator = new OpenAITextGenerator({ apiKey: "test-secret" });

    await expect(
      generator.generate("Summarize this", { model: "test-model", maxTokens: 64 })
    ).resolves.toBe("- Shipped the release");

    expect(createMock).toHaveBeenCalledWith({
      model: "test-model",
      messages: [{ role: "user", content: "Summarize this" }],
      temperature: 0.9,
      max_tokens: 64,
    });
  });

  it("should reject an empty completion", async () => {
    createMock.mockResolvedValue({ choices: [{ message: { content: "" } }] });
    const generator = new OpenAITextGenerator({ apiKey: "test-secret" });

    await expect(
      generator.generate("Summarize this", { model: "test-model", maxTokens: 64 })
    ).rejects.toThrow("No text received from model test-model");
  });

  it("should pass API errors through", async () => {
    createMock.mockRejectedValue(new Error("connect ECONNREFUSED"));
    const generator = new OpenAITextGenerator({ apiKey: "test-secret" });

    await expect(
      generator.generate("Summarize this", { model: "test-model", maxTokens: 64 })
    ).rejects.toThrow("connect ECONNREFUSED");
  });
});
