import OpenAI from "openai";
import type { GeneratorConfig } from "../config";
import { DEFAULT_AI_TEMPERATURE } from "../constants";

export interface GenerationOptions {
  model: string;
  maxTokens: number;
}

/**
 * Prompt in, text out. The summarizer only knows this interface.
 */
export interface TextGenerator {
  generate(prompt: string, options: GenerationOptions): Promise<string>;
}

/**
 * Text generator for any OpenAI-compatible chat completions endpoint.
 * Point OPENAI_BASE_URL at a local server (Ollama, LM Studio, llama.cpp)
 * to keep standup notes on the machine.
 */
export class OpenAITextGenerator implements TextGenerator {
  private readonly client: OpenAI;

  constructor(config: Pick<GeneratorConfig, "apiKey" | "baseURL">) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      maxRetries: 0,
    });
  }

  async generate(prompt: string, options: GenerationOptions): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: options.model,
      messages: [{ role: "user", content: prompt }],
      temperature: DEFAULT_AI_TEMPERATURE,
      max_tokens: options.maxTokens,
    });

    const text = response.choices[0]?.message?.content;
    if (!text) {
      throw new Error(`No text received from model ${options.model}`);
    }
    return text;
  }
}
