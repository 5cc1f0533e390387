import axios from "axios";
import { z } from "zod";
import type { StoredMessage } from "../models/Message.js";
import { UpstreamError } from "./errors.js";
import { errorMeta, logger } from "./logger.js";

export interface AgentAudio {
  content: Buffer;
  contentType: string;
}

export interface AgentInput {
  text: string;
  audio?: AgentAudio;
  userId: string;
  sessionId: string;
  history?: StoredMessage[];
}

export type AgentResult = { ok: true; text: string } | { ok: false; error: UpstreamError };

export interface ConversationalAgent {
  invoke(input: AgentInput): Promise<AgentResult>;
}

export interface CompletionClient {
  post(path: string, body: unknown): Promise<{ data: unknown }>;
}

export interface OpenRouterAgentOptions {
  apiKey?: string;
  model: string;
  maxTokens?: number;
  topP?: number;
  client?: CompletionClient;
}

type ContentPart =
  | { type: "text"; text: string }
  | { type: "input_audio"; input_audio: { data: string; format: string } };

type ChatMessage =
  | { role: "system" | "assistant"; content: string }
  | { role: "user"; content: string | ContentPart[] };

const REQUEST_TIMEOUT_MS = 45_000;
const MAX_ATTEMPTS = 2;

export const AUDIO_INSTRUCTION =
  "Listen to this audio. Search knowledge base and respond in French using 'vous'.";

const SYSTEM_DIRECTIVE = [
  "You are a customer support assistant for a pharmacy management platform.",
  "You understand French and Moroccan Darija, including mixed-language audio, but always answer in clear French and address the user with 'vous'.",
  "Ask one question at a time and keep each reply between 15 and 50 words unless a procedure needs numbered steps.",
  "If a question is unrelated to the platform, politely decline and bring the conversation back to it.",
].join(" ");

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.unknown() }),
      })
    )
    .min(1),
});

const textPartSchema = z.object({ type: z.literal("text"), text: z.string() });

/** Reads the reply text off a completion body: plain string, text parts, or the stringified value. */
export const extractReplyText = (body: unknown): string | null => {
  const parsed = completionSchema.safeParse(body);
  if (!parsed.success) {
    return null;
  }

  const content = parsed.data.choices[0].message.content;
  if (content === null || content === undefined) {
    return null;
  }

  let text: string;
  if (typeof content === "string") {
    text = content;
  } else if (Array.isArray(content)) {
    text = content
      .map((part) => textPartSchema.safeParse(part))
      .flatMap((result) => (result.success ? [result.data.text] : []))
      .join("");
  } else {
    text = JSON.stringify(content);
  }

  return text.trim() ? text : null;
};

export const audioFormatFor = (contentType: string): string => {
  const subtype = contentType.split(";")[0].split("/")[1]?.trim().toLowerCase() ?? "";

  switch (subtype) {
    case "mpeg":
    case "mp3":
      return "mp3";
    case "x-wav":
    case "wav":
      return "wav";
    case "":
      return "ogg";
    default:
      return subtype;
  }
};

export const buildMessages = (input: AgentInput): ChatMessage[] => {
  const history = (input.history ?? []).map((entry): ChatMessage =>
    entry.sender === "agent"
      ? { role: "assistant", content: entry.message }
      : { role: "user", content: entry.message }
  );

  const current: ChatMessage = input.audio
    ? {
        role: "user",
        content: [
          { type: "text", text: input.text },
          {
            type: "input_audio",
            input_audio: {
              data: input.audio.content.toString("base64"),
              format: audioFormatFor(input.audio.contentType),
            },
          },
        ],
      }
    : { role: "user", content: input.text };

  return [{ role: "system", content: SYSTEM_DIRECTIVE }, ...history, current];
};

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

const shouldRetry = (error: unknown, attempt: number): boolean => {
  if (attempt >= MAX_ATTEMPTS - 1) {
    return false;
  }

  if (!axios.isAxiosError(error)) {
    return false;
  }

  const status = error.response?.status;
  return status === 429 || (status !== undefined && status >= 500 && status < 600);
};

const createOpenRouterClient = (apiKey: string): CompletionClient => {
  const client = axios.create({
    baseURL: "https://openrouter.ai/api/v1",
    timeout: REQUEST_TIMEOUT_MS,
    headers: {
      Authorization: `Bearer ${apiKey}`,
      "Content-Type": "application/json",
      "X-Title": "WhatsApp Support Relay",
    },
  });

  return {
    post: (path, body) => client.post<unknown>(path, body),
  };
};

export const createOpenRouterAgent = (options: OpenRouterAgentOptions): ConversationalAgent => {
  const client = options.client ?? (options.apiKey ? createOpenRouterClient(options.apiKey) : null);

  const complete = async (messages: ChatMessage[]): Promise<string> => {
    if (!client) {
      throw new UpstreamError("Agent is not configured");
    }

    let attempt = 0;
    let lastError: unknown;

    while (attempt < MAX_ATTEMPTS) {
      try {
        const response = await client.post("/chat/completions", {
          model: options.model,
          messages,
          temperature: 0.2,
          max_tokens: options.maxTokens,
          top_p: options.topP,
        });

        const text = extractReplyText(response.data);
        if (!text) {
          throw new UpstreamError("Agent response missing message content");
        }

        return text;
      } catch (error) {
        lastError = error;

        if (!shouldRetry(error, attempt)) {
          break;
        }

        const backoff = 500 * (attempt + 1) + Math.floor(Math.random() * 250);
        await delay(backoff);
        attempt += 1;
      }
    }

    if (lastError instanceof UpstreamError) {
      throw lastError;
    }

    throw new UpstreamError("Agent request failed", { cause: lastError });
  };

  return {
    invoke: async (input) => {
      try {
        const text = await complete(buildMessages(input));
        return { ok: true, text };
      } catch (error) {
        const failure =
          error instanceof UpstreamError ? error : new UpstreamError("Agent request failed", { cause: error });
        return { ok: false, error: failure };
      }
    },
  };
};

/**
 * Defers building the agent until the first invocation. Concurrent first calls
 * share one construction; a failed construction is retried on the next call.
 */
export const createLazyAgent = (factory: () => Promise<ConversationalAgent>): ConversationalAgent => {
  let instance: ConversationalAgent | null = null;
  let pending: Promise<ConversationalAgent> | null = null;

  const resolve = async (): Promise<ConversationalAgent> => {
    if (instance) {
      return instance;
    }

    if (!pending) {
      pending = factory()
        .then((agent) => {
          instance = agent;
          logger.info("agent.ready");
          return agent;
        })
        .finally(() => {
          pending = null;
        });
    }

    return pending;
  };

  return {
    invoke: async (input) => {
      try {
        const agent = await resolve();
        return await agent.invoke(input);
      } catch (error) {
        logger.error("agent.init_failed", errorMeta(error));
        return { ok: false, error: new UpstreamError("Agent unavailable", { cause: error }) };
      }
    },
  };
};
