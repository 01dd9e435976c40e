import { logger as rootLogger, type Logger } from "../utils/logger";
import { errorMessage } from "../utils/errors";
import type { DefaultSettingsLoader } from "./defaults";
import type { KvStore } from "./kvStore";
import {
  CorruptRecordError,
  STORE_OK,
  storeFailure,
  type StoreResult,
} from "./result";
import {
  SettingValueSchema,
  SettingsRecordSchema,
  isUnsafeKey,
  type ChatConfig,
  type SettingsRecord,
} from "./settings";
import { USER_GROUP_LINKS_KEY } from "./userGroupLinks";

const CHAT_KEY_RE = /^-?\d+$/;

/** Top-level keys owned by other repositories sharing the same file. */
export const RESERVED_KEYS: ReadonlySet<string> = new Set([USER_GROUP_LINKS_KEY]);

export function chatKey(chatId: number): string | null {
  return Number.isSafeInteger(chatId) ? String(chatId) : null;
}

/**
 * Per-chat settings: a row of overrides per chat, read through the defaults.
 * Only explicitly written keys are persisted.
 */
export class ChatConfigStore {
  constructor(
    private readonly kv: KvStore,
    private readonly defaults: DefaultSettingsLoader,
    private readonly log: Logger = rootLogger.child({ module: "chat-config" }),
    private readonly reservedKeys: ReadonlySet<string> = RESERVED_KEYS
  ) {}

  /** Defaults overlaid with the chat's overrides. Never throws; every call returns a fresh copy. */
  get(chatId: number): ChatConfig {
    return { ...this.defaults.load(), ...this.getOverrides(chatId) };
  }

  getOverrides(chatId: number): SettingsRecord {
    const key = chatKey(chatId);
    if (key === null) return {};

    let raw: unknown;
    try {
      raw = this.kv.get(key);
    } catch (e) {
      this.log.error({ err: e, chatId }, "Could not read chat overrides; using defaults");
      return {};
    }
    if (raw === undefined) return {};

    const parsed = SettingsRecordSchema.safeParse(raw);
    if (!parsed.success) {
      this.log.warn({ chatId }, "Stored chat overrides are not a settings object; ignoring them");
      return {};
    }
    return parsed.data;
  }

  /** Replaces the whole override record. Either the new record lands or the old one stays. */
  update(chatId: number, fullConfig: SettingsRecord): StoreResult {
    const key = chatKey(chatId);
    if (key === null) return storeFailure("invalid_id", `Chat id ${chatId} is not an integer`);

    const parsed = SettingsRecordSchema.safeParse(fullConfig);
    if (!parsed.success || Object.keys(fullConfig).some(isUnsafeKey)) {
      return storeFailure("invalid_value", "Config contains values that cannot be stored");
    }
    const record = parsed.data;

    return this.write(key, () => this.kv.put(key, record));
  }

  setSetting(chatId: number, settingKey: string, value: unknown): StoreResult {
    const key = chatKey(chatId);
    if (key === null) return storeFailure("invalid_id", `Chat id ${chatId} is not an integer`);

    if (isUnsafeKey(settingKey)) {
      return storeFailure("invalid_value", `"${settingKey}" cannot be used as a setting key`);
    }
    const parsed = SettingValueSchema.safeParse(value);
    if (!parsed.success) {
      return storeFailure("invalid_value", `Value for "${settingKey}" cannot be stored`);
    }
    const settingValue = parsed.data;

    return this.write(key, () => {
      const current = this.readForWrite(key);
      current[settingKey] = settingValue;
      this.kv.put(key, current);
    });
  }

  delete(chatId: number): StoreResult {
    const key = chatKey(chatId);
    if (key === null) return storeFailure("invalid_id", `Chat id ${chatId} is not an integer`);
    return this.write(key, () => {
      this.kv.delete(key);
    });
  }

  listKnownChatIds(): number[] {
    let keys: string[];
    try {
      keys = this.kv.keys();
    } catch (e) {
      this.log.error({ err: e }, "Could not list stored chats");
      return [];
    }
    return keys
      .filter((k) => !this.reservedKeys.has(k) && CHAT_KEY_RE.test(k))
      .map(Number)
      .filter((id) => Number.isSafeInteger(id));
  }

  private readForWrite(key: string): SettingsRecord {
    let raw: unknown;
    try {
      raw = this.kv.get(key);
    } catch (e) {
      if (e instanceof SyntaxError) throw new CorruptRecordError(key, e.message);
      throw e;
    }
    if (raw === undefined) return {};
    const parsed = SettingsRecordSchema.safeParse(raw);
    if (!parsed.success) throw new CorruptRecordError(key, "not a settings object");
    return parsed.data;
  }

  private write(key: string, fn: () => void): StoreResult {
    try {
      this.kv.exclusive(fn);
      return STORE_OK;
    } catch (e) {
      if (e instanceof CorruptRecordError) {
        this.log.error({ key }, e.message);
        return storeFailure("corrupt", e.message);
      }
      this.log.error({ err: e, key }, "Chat config write failed");
      return storeFailure("io", errorMessage(e));
    }
  }
}
