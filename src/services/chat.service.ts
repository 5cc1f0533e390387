import type { AgentAudio, ConversationalAgent } from "../lib/agent.js";
import { logger } from "../lib/logger.js";
import { APOLOGY_API_TURN } from "../lib/replies.js";
import { sessionIdFor, toUtcString } from "../models/Message.js";
import type { ConversationStore } from "./conversation.service.js";

export interface TurnRequest {
  userId: string;
  sessionId: string;
  timestamp: Date;
  /** Persisted as the user's side of the turn. */
  userMessage: { message: string; audioUrl?: string; mediaType?: string };
  /** Sent to the agent; differs from `userMessage` for audio turns. */
  prompt: string;
  audio?: AgentAudio;
  /** Stored and returned in place of the reply when the agent fails. */
  apology: string;
}

export interface TurnOutcome {
  reply: string;
  answered: boolean;
}

export interface ChatApiResponse {
  user_id: string;
  message: string;
  agent_response: string;
  timestamp: string;
}

export interface ChatService {
  runTurn(request: TurnRequest): Promise<TurnOutcome>;
  chat(userId: string, message: string): Promise<ChatApiResponse>;
}

export interface ChatServiceDeps {
  store: ConversationStore;
  agent: ConversationalAgent;
  historyTurns: number;
}

export const createChatService = ({ store, agent, historyTurns }: ChatServiceDeps): ChatService => {
  const runTurn = async (request: TurnRequest): Promise<TurnOutcome> => {
    const { userId, sessionId } = request;
    const history = await store.recent(userId, sessionId, historyTurns);

    await store.append({
      userId,
      sessionId,
      sender: "user",
      timestamp: request.timestamp,
      ...request.userMessage,
    });

    const result = await agent.invoke({
      text: request.prompt,
      audio: request.audio,
      userId,
      sessionId,
      history,
    });

    if (!result.ok) {
      logger.error("agent.invoke_failed", {
        userId,
        error: result.error.message,
        cause: result.error.cause instanceof Error ? result.error.cause.message : undefined,
      });
    }

    const reply = result.ok ? result.text : request.apology;

    await store.append({ userId, sessionId, sender: "agent", message: reply });

    return { reply, answered: result.ok };
  };

  return {
    runTurn,
    chat: async (userId, message) => {
      const timestamp = new Date();
      const { reply } = await runTurn({
        userId,
        sessionId: sessionIdFor(userId),
        timestamp,
        userMessage: { message },
        prompt: message,
        apology: APOLOGY_API_TURN,
      });

      return {
        user_id: userId,
        message,
        agent_response: reply,
        timestamp: toUtcString(timestamp),
      };
    },
  };
};
