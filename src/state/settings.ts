import { z } from "zod";

export type SettingValue =
  | string
  | number
  | boolean
  | null
  | SettingValue[]
  | { [key: string]: SettingValue };

/** An open key → value record: the shape of defaults, overrides and effective configs. */
export type SettingsRecord = Record<string, SettingValue>;
export type ChatConfig = SettingsRecord;

export type FaqPair = [question: string, answer: string];
export type GroupMention = { keyword: string; description: string };

export const SettingValueSchema: z.ZodType<SettingValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(SettingValueSchema),
    z.record(SettingValueSchema),
  ])
);

export const SettingsRecordSchema = z.record(SettingValueSchema);

const FaqListSchema = z.array(z.tuple([z.string(), z.string()]));
const MentionListSchema = z.array(
  z.object({ keyword: z.string(), description: z.string().default("") })
);

// Well-known keys. Anything else in a record is kept as-is.
export const KEYS = {
  botDisplayName: "bot_display_name",
  gsheetUrl: "gsheet_url",
  settingsSheetName: "settings_sheet_name",
  faqSheetName: "faq_sheet_name",
  faqs: "faqs_list",
  personalityPrompt: "personality_prompt_text",
  welcomeMessage: "welcome_message",
  mentions: "mentions",
  groupMentions: "group_mentions",
  errorNonAdmin: "error_message_non_admin",
  genericError: "bot_generic_error_message",
  anonqEnabled: "anonq_enabled",
  syncConflict: "gsheet_sync_conflict",
} as const;

/** Keys that describe local state and never travel to or from the sheet. */
export const LOCAL_ONLY_KEYS: ReadonlySet<string> = new Set([
  KEYS.faqs,
  KEYS.syncConflict,
  KEYS.gsheetUrl,
]);

/** Keys that would land on an object's prototype instead of in the record. */
export const isUnsafeKey = (key: string) => key === "__proto__";

export function readString(config: SettingsRecord, key: string): string | undefined {
  const v = config[key];
  return typeof v === "string" && v.trim() !== "" ? v : undefined;
}

export function readBool(config: SettingsRecord, key: string, fallback: boolean): boolean {
  const v = config[key];
  return typeof v === "boolean" ? v : fallback;
}

export function readStringList(config: SettingsRecord, key: string): string[] {
  const v = config[key];
  if (!Array.isArray(v)) return [];
  return v.filter((x): x is string => typeof x === "string" && x.trim() !== "");
}

export function readFaqs(config: SettingsRecord): FaqPair[] {
  const parsed = FaqListSchema.safeParse(config[KEYS.faqs]);
  return parsed.success ? parsed.data : [];
}

export function readMentions(config: SettingsRecord): GroupMention[] {
  const v = config[KEYS.groupMentions];
  if (!Array.isArray(v)) return [];
  // Drop malformed entries one by one instead of losing the whole list.
  return v.flatMap((item) => {
    const parsed = MentionListSchema.element.safeParse(item);
    return parsed.success ? [parsed.data] : [];
  });
}

export function faqsToValue(faqs: FaqPair[]): SettingValue {
  return faqs.map(([q, a]) => [q, a]);
}

export function mentionsToValue(mentions: GroupMention[]): SettingValue {
  return mentions.map((m) => ({ keyword: m.keyword, description: m.description }));
}
