import Anthropic from "@anthropic-ai/sdk";

export interface CompletionOptions {
  maxTokens?: number;
}

/**
 * Single free-text prompt in, single free-text completion out.
 */
export interface CompletionClient {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export interface AnthropicCompletionConfig {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class AnthropicCompletionClient implements CompletionClient {
  private readonly client: Anthropic;

  constructor(private readonly config: AnthropicCompletionConfig) {
    this.client = new Anthropic({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      // Failures fall back per call site; no SDK-level retries
      maxRetries: 0,
    });
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const response = await this.client.messages.create({
      model: this.config.model,
      max_tokens: options.maxTokens ?? 1024,
      messages: [
        {
          role: "user",
          content: prompt,
        },
      ],
    });

    const block = response.content[0];
    return block && block.type === "text" ? block.text.trim() : "";
  }
}
