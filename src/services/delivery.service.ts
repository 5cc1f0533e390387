import { formatOutbound, renderTwiml, type ChannelClient } from "../lib/channel.js";
import { errorMeta, logger } from "../lib/logger.js";

export interface OutboundReply {
  status: 200 | 204;
  contentType?: "application/xml" | "text/plain";
  body: string;
  tier: "api" | "markup" | "text";
}

export interface DeliveryService {
  /** Full chain: provider API, then inline markup, then plain text. */
  deliver(userId: string, text: string): Promise<OutboundReply>;
  /** Inline markup, falling back to plain text. Never throws. */
  respondWithText(text: string): OutboundReply;
}

export interface DeliveryOptions {
  channel: ChannelClient | null;
  renderMarkup?: (text: string) => string;
}

export const createDeliveryService = ({
  channel,
  renderMarkup = renderTwiml,
}: DeliveryOptions): DeliveryService => {
  const respondWithText = (text: string): OutboundReply => {
    const formatted = formatOutbound(text);

    try {
      return {
        status: 200,
        contentType: "application/xml",
        body: renderMarkup(formatted),
        tier: "markup",
      };
    } catch (error) {
      logger.error("delivery.markup_failed", errorMeta(error));
      return { status: 200, contentType: "text/plain", body: formatted, tier: "text" };
    }
  };

  return {
    deliver: async (userId, text) => {
      if (!channel) {
        return respondWithText(text);
      }

      try {
        const { id } = await channel.sendText(userId, formatOutbound(text));
        logger.info("delivery.sent", { userId, messageId: id });
        return { status: 204, body: "", tier: "api" };
      } catch (error) {
        logger.error("delivery.api_failed", { userId, ...errorMeta(error) });
        return respondWithText(text);
      }
    },
    respondWithText,
  };
};
