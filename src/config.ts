import path from "node:path";
import { z } from "zod";
import { logger } from "./utils/logger";

// Treat `FOO=` in .env the same as an unset variable.
const blankToUndefined = (v: unknown) =>
  typeof v === "string" && v.trim() === "" ? undefined : v;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const EnvSchema = z.object({
  BOT_TOKEN: optionalString,
  BOT_MODE: z.preprocess(blankToUndefined, z.enum(["polling", "webhook"]).default("polling")),
  PUBLIC_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(5555)),
  HOST: z.preprocess(blankToUndefined, z.string().default("0.0.0.0")),

  AI_PROVIDER: z.preprocess(
    (v) => (typeof v === "string" ? blankToUndefined(v.toLowerCase()) : v),
    z.enum(["auto", "openai", "gemini"]).default("auto")
  ),
  OPENAI_API_KEY: optionalString,
  OPENAI_API_BASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  OPENAI_MODEL: z.preprocess(blankToUndefined, z.string().default("gpt-4o-mini")),
  GOOGLE_API_KEY: optionalString,
  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.preprocess(blankToUndefined, z.string().default("gemini-1.5-flash")),

  BOSS_ID: optionalString,

  STORE_FILE_PATH: z.preprocess(blankToUndefined, z.string().default("data/chat_configs.db")),
  DEFAULT_SETTINGS_FILE_PATH: z.preprocess(
    blankToUndefined,
    z.string().default("data/default_settings.json")
  ),
  PROMPTS_DIR_PATH: z.preprocess(blankToUndefined, z.string().default("data/prompts")),
  GSPREAD_KEY_FILE_PATH: z.preprocess(blankToUndefined, z.string().default("data/gspread_key.json")),
  MAX_MENTIONS_PER_CHAT: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(10)
  ),
});

export type ProviderPref = "auto" | "openai" | "gemini";

export type AppConfig = {
  botToken?: string;
  botMode: "polling" | "webhook";
  publicUrl?: string;
  port: number;
  host: string;
  ai: {
    provider: ProviderPref;
    openaiApiKey?: string;
    openaiBaseUrl?: string;
    openaiModel: string;
    googleApiKey?: string;
    geminiModel: string;
  };
  bossId?: number;
  paths: {
    store: string;
    defaultSettings: string;
    prompts: string;
    gspreadKey: string;
  };
  maxMentionsPerChat: number;
};

function parseBossId(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isSafeInteger(n)) {
    logger.warn({ bossId: raw }, "BOSS_ID is not a valid integer; owner alerts are disabled");
    return undefined;
  }
  return n;
}

/**
 * Reads the process environment into a typed config. Throws when a variable
 * is present but malformed, so a bad deployment fails at startup.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  baseDir: string = process.cwd()
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid environment: ${issues}`);
  }
  const e = parsed.data;
  const resolve = (p: string) => path.resolve(baseDir, p);

  return {
    botToken: e.BOT_TOKEN,
    botMode: e.BOT_MODE,
    publicUrl: e.PUBLIC_URL,
    port: e.PORT,
    host: e.HOST,
    ai: {
      provider: e.AI_PROVIDER,
      openaiApiKey: e.OPENAI_API_KEY,
      openaiBaseUrl: e.OPENAI_API_BASE_URL,
      openaiModel: e.OPENAI_MODEL,
      // LangChain reads GOOGLE_API_KEY; GEMINI_API_KEY is accepted as an alias
      googleApiKey: e.GOOGLE_API_KEY ?? e.GEMINI_API_KEY,
      geminiModel: e.GEMINI_MODEL,
    },
    bossId: parseBossId(e.BOSS_ID),
    paths: {
      store: resolve(e.STORE_FILE_PATH),
      defaultSettings: resolve(e.DEFAULT_SETTINGS_FILE_PATH),
      prompts: resolve(e.PROMPTS_DIR_PATH),
      gspreadKey: resolve(e.GSPREAD_KEY_FILE_PATH),
    },
    maxMentionsPerChat: e.MAX_MENTIONS_PER_CHAT,
  };
}
