import twilio from "twilio";

export const WHATSAPP_PREFIX = "whatsapp:";

export interface ChannelConfig {
  accountSid?: string;
  authToken?: string;
  phoneNumber?: string;
}

export interface ChannelClient {
  sendText(userId: string, body: string): Promise<{ id: string }>;
}

/** Drops the transport scheme from a raw sender address (`whatsapp:+2126...` → `+2126...`). */
export const normalizeSenderId = (raw: string): string => raw.replaceAll(WHATSAPP_PREFIX, "").trim();

/** WhatsApp renders single asterisks as bold; markdown uses doubled ones. */
export const formatOutbound = (text: string): string => text.replaceAll("**", "*");

/** Renders an inline TwiML reply carrying one message. */
export const renderTwiml = (text: string): string => {
  const response = new twilio.twiml.MessagingResponse();
  response.message(text);
  return response.toString();
};

/** Returns null unless credentials and a sender number are all present. */
export const createTwilioChannel = (config: ChannelConfig): ChannelClient | null => {
  const { accountSid, authToken, phoneNumber } = config;
  if (!accountSid || !authToken || !phoneNumber) {
    return null;
  }

  const client = twilio(accountSid, authToken);

  return {
    sendText: async (userId, body) => {
      const message = await client.messages.create({
        from: `${WHATSAPP_PREFIX}${phoneNumber}`,
        to: `${WHATSAPP_PREFIX}${userId}`,
        body,
      });
      return { id: message.sid };
    },
  };
};
