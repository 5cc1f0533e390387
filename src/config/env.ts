import { config } from "dotenv";
import { z } from "zod";

config();

const blankToUndefined = (value: unknown) => {
  if (value === undefined || value === null) {
    return undefined;
  }

  const trimmed = String(value).trim();
  return trimmed ? trimmed : undefined;
};

const optionalString = z.preprocess(blankToUndefined, z.string().optional());

const optionalNumber = (schema: z.ZodNumber) =>
  z.preprocess((value) => {
    const trimmed = blankToUndefined(value);
    if (trimmed === undefined) {
      return undefined;
    }

    const numeric = Number(trimmed);
    return Number.isNaN(numeric) ? trimmed : numeric;
  }, schema.optional());

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  MONGODB_URI: optionalString,
  MONGODB_DB: z.preprocess(blankToUndefined, z.string().default("customer_service")),
  MONGODB_COLLECTION: z.preprocess(blankToUndefined, z.string().default("chat_messages")),
  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_PHONE_NUMBER: optionalString,
  OPENROUTER_API_KEY: optionalString,
  OPENROUTER_MODEL: z.preprocess(blankToUndefined, z.string().default("google/gemini-2.5-flash")),
  OPENROUTER_MAX_TOKENS: optionalNumber(z.number().int().positive()),
  OPENROUTER_TOP_P: optionalNumber(z.number().min(0).max(1)),
  AGENT_HISTORY_TURNS: z.coerce.number().int().nonnegative().default(6),
  CHAT_RATE_LIMIT: z.coerce.number().int().nonnegative().default(0),
});

export type AppEnvironment = z.infer<typeof envSchema>;

export const parseEnv = (source: NodeJS.ProcessEnv): AppEnvironment => {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const invalid = Object.entries(parsed.error.flatten().fieldErrors)
      .filter(([, errors]) => errors && errors.length > 0)
      .map(([key]) => key)
      .join(", ");

    throw new Error(`Invalid environment configuration. Missing or invalid: ${invalid}`);
  }

  return parsed.data;
};

export const env = parseEnv(process.env);
