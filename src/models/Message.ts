import { Schema } from "mongoose";

export const SENDERS = ["user", "agent"] as const;
export type Sender = (typeof SENDERS)[number];

/** Shape of a chat message as it sits in the collection. */
export interface MessageDocument {
  user_id: string;
  message: string;
  sender: Sender;
  timestamp: Date;
  session_id: string;
  audio_url?: string;
  media_type?: string;
}

export interface StoredMessage extends MessageDocument {
  _id: string;
}

/** JSON shape on read; timestamps carry an explicit UTC marker. */
export interface SerializedMessage extends Omit<StoredMessage, "timestamp"> {
  timestamp: string;
}

export const messageSchema = new Schema<MessageDocument>(
  {
    // Empty when the provider omits the sender.
    user_id: { type: String, default: "", index: true },
    message: { type: String, required: true },
    sender: { type: String, enum: SENDERS, required: true },
    timestamp: { type: Date, required: true },
    session_id: { type: String, required: true, index: true },
    audio_url: { type: String },
    media_type: { type: String },
  },
  {
    versionKey: false,
  }
);

messageSchema.index({ user_id: 1, timestamp: -1 });
messageSchema.index({ session_id: 1, timestamp: -1 });

export const sessionIdFor = (userId: string): string => `${userId}_session`;

export const toUtcString = (value: Date): string => value.toISOString();

export const serializeMessage = (stored: StoredMessage): SerializedMessage => {
  const serialized: SerializedMessage = {
    _id: stored._id,
    user_id: stored.user_id,
    message: stored.message,
    sender: stored.sender,
    timestamp: toUtcString(stored.timestamp),
    session_id: stored.session_id,
  };

  if (stored.audio_url) {
    serialized.audio_url = stored.audio_url;
  }
  if (stored.media_type) {
    serialized.media_type = stored.media_type;
  }

  return serialized;
};
