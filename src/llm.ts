import OpenAI from "openai";
import { TransportError } from "./errors.js";
import type { LlmConfig } from "./config.js";
import { errorMessage } from "./pipeline/utils.js";

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type GenerateOptions = {
  signal?: AbortSignal;
};

/** Role-tagged messages in, one completion string out. Failures surface as `TransportError`. */
export type GenerateFn = (messages: ChatMessage[], options?: GenerateOptions) => Promise<string>;

type ChatCompletionBody = {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  max_tokens?: number;
};

type ChatCompletionLike = {
  choices?: Array<{ message?: { content?: string | null } | null } | null>;
};

/** The slice of the `openai` client this module calls; tests hand in a fake. */
export type ChatCompletionsClient = {
  chat: {
    completions: {
      create(body: ChatCompletionBody, options?: { signal?: AbortSignal; timeout?: number }): Promise<ChatCompletionLike>;
    };
  };
};

function statusOf(err: unknown): number | undefined {
  if (!err || typeof err !== "object" || !("status" in err)) return undefined;
  return typeof err.status === "number" ? err.status : undefined;
}

export function createChatGenerator(
  client: ChatCompletionsClient,
  config: Pick<LlmConfig, "model" | "temperature" | "maxTokens" | "timeoutMs">
): GenerateFn {
  return async (messages, options) => {
    let completion: ChatCompletionLike;
    try {
      completion = await client.chat.completions.create(
        {
          model: config.model,
          messages,
          temperature: config.temperature,
          max_tokens: config.maxTokens
        },
        { signal: options?.signal, timeout: config.timeoutMs }
      );
    } catch (err) {
      const status = statusOf(err);
      const prefix = status ? `Generation endpoint returned HTTP ${status}` : "Generation endpoint request failed";
      throw new TransportError(`${prefix}: ${errorMessage(err)}`, status);
    }

    const content = completion.choices?.[0]?.message?.content;
    if (content === undefined) {
      throw new TransportError("Generation endpoint returned a malformed response envelope (no choices[0].message)");
    }
    return content ?? "";
  };
}

export function createOpenAiGenerator(config: LlmConfig): GenerateFn {
  const openai = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.apiUrl,
    timeout: config.timeoutMs,
    // Retries belong to the continuation protocol, not the transport.
    maxRetries: 0
  });
  const client: ChatCompletionsClient = {
    chat: {
      completions: {
        create: (body, options) => openai.chat.completions.create({ ...body, stream: false }, options)
      }
    }
  };
  return createChatGenerator(client, config);
}
