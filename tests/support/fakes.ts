import { vi } from "vitest";
import type { AgentInput, AgentResult, ConversationalAgent } from "../../src/lib/agent.js";
import type { ChannelClient } from "../../src/lib/channel.js";
import { MediaFetchError, UpstreamError } from "../../src/lib/errors.js";
import type { MediaFetcher, MediaFetchResult } from "../../src/lib/media.js";

export const replyingAgent = (reply: (input: AgentInput) => string = (input) => `echo: ${input.text}`) => {
  const invoke = vi.fn(async (input: AgentInput): Promise<AgentResult> => ({ ok: true, text: reply(input) }));
  const agent: ConversationalAgent = { invoke };
  return { agent, invoke };
};

export const failingAgent = () => {
  const invoke = vi.fn(
    async (_input: AgentInput): Promise<AgentResult> => ({
      ok: false,
      error: new UpstreamError("model offline"),
    })
  );
  const agent: ConversationalAgent = { invoke };
  return { agent, invoke };
};

export const stubMedia = (result: MediaFetchResult) => {
  const fetch = vi.fn(async (_url: string) => result);
  const media: MediaFetcher = { fetch };
  return { media, fetch };
};

export const audioBytes = (text = "voice-note"): MediaFetchResult => ({
  ok: true,
  media: { content: Buffer.from(text), contentType: "audio/ogg", url: "https://media.test/voice" },
});

export const unreachableMedia = (): MediaFetchResult => ({
  ok: false,
  error: new MediaFetchError("Media request failed with status 404", "https://media.test/voice", { status: 404 }),
});

export const recordingChannel = (options: { fail?: boolean } = {}) => {
  const sendText = vi.fn(async (_userId: string, _body: string) => {
    if (options.fail) {
      throw new Error("provider rejected the message");
    }
    return { id: "SM-test-1" };
  });
  const channel: ChannelClient = { sendText };
  return { channel, sendText };
};
