/**
 * Runtime configuration, read once from the environment and validated.
 * `dotenv/config` must be imported by the entry point before this runs.
 */

import { z } from 'zod'

const optionalString = z
  .string()
  .optional()
  .transform(v => (v && v.trim() ? v.trim() : undefined))

export const ConfigSchema = z
  .object({
    DATABASE_URL: z.string().min(1),
    PORT: z.coerce.number().int().positive().default(3000),

    TELEGRAM_BOT_TOKEN: z.string().min(1),
    TELEGRAM_OPERATOR_CHAT_ID: z.string().min(1),
    TELEGRAM_WEBHOOK_SECRET: optionalString,
    TELEGRAM_UPDATE_MODE: z.enum(['webhook', 'polling']).default('webhook'),

    BRIDGE_API_URL: z.string().url().default('http://localhost:8080/api'),
    BRIDGE_DB_PATH: z.string().default('../whatsapp-bridge/store/messages.db'),

    DRAFT_MODE: z.enum(['stateless', 'stateful']).default('stateless'),
    GROQ_API_KEY: z.string().min(1),
    GROQ_MODEL: z.string().default('llama-3.3-70b-versatile'),
    OPENAI_API_KEY: optionalString,
    OPENAI_ASSISTANT_ID: optionalString,
    DRAFT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    MAX_CONVERSATION_HISTORY: z.coerce.number().int().positive().default(10),
    AI_SYSTEM_PROMPT: z
      .string()
      .default(
        'You are replying to WhatsApp messages on behalf of the account owner. ' +
        'Answer briefly and naturally in the language of the last message. ' +
        'Never claim to be an AI and never promise anything you cannot know.'
      ),

    WHISPER_MODEL: z.string().default('whisper-large-v3'),
    WHISPER_LANGUAGE: optionalString,
    VOICE_TIMEOUT_MS: z.coerce.number().int().positive().default(45_000),

    POLL_INTERVAL_MS: z.coerce.number().int().positive().default(2000),
    POLL_BATCH_SIZE: z.coerce.number().int().positive().default(100),
    INGEST_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    APPROVAL_TTL_MINUTES: z.coerce.number().positive().default(720),

    DELIVERY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    DELIVERY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
    DELIVERY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(8000),
    SEND_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),

    GOOGLE_SHEETS_CREDENTIALS_FILE: optionalString,
    GOOGLE_SHEET_ID: optionalString,
    SHEET_NAME: z.string().default('WhatsApp Messages'),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.DRAFT_MODE === 'stateful' && (!cfg.OPENAI_API_KEY || !cfg.OPENAI_ASSISTANT_ID)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_ASSISTANT_ID'],
        message: 'DRAFT_MODE=stateful needs OPENAI_API_KEY and OPENAI_ASSISTANT_ID',
      })
    }
  })

export type RelayConfig = z.infer<typeof ConfigSchema>

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const result = ConfigSchema.safeParse(env)
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid configuration: ${problems}`)
  }
  return result.data
}
