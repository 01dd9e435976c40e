import { logger as rootLogger, type Logger } from "../utils/logger";
import { isSheetUrl } from "../utils/parse";
import type { ChatConfigStore } from "../state/chatConfig";
import type { DefaultSettingsLoader } from "../state/defaults";
import type { StoreFailure } from "../state/result";
import {
  KEYS,
  faqsToValue,
  readString,
  type ChatConfig,
  type FaqPair,
  type SettingValue,
  type SettingsRecord,
} from "../state/settings";
import type { SheetSync } from "./sheets";

export type SyncStatus = "synced" | "failed" | "not_configured";

export type ApplyResult =
  | { saved: true; sync: SyncStatus; config: ChatConfig }
  | { saved: false; failure: StoreFailure };

export type RefreshResult =
  | { configured: false }
  | {
      configured: true;
      /** Number of FAQs stored, or null when the FAQ sheet could not be read or saved. */
      faqCount: number | null;
      settingsOk: boolean;
    };

export type ConnectResult =
  | { ok: true; faqs: FaqPair[] | null }
  | { ok: false; reason: "bad_url" }
  | { ok: false; reason: "no_access"; error: string }
  | { ok: false; reason: "write_failed" }
  | { ok: false; reason: "save_failed"; message: string };

const DEFAULT_FAQ_SHEET = "FAQs";
const DEFAULT_SETTINGS_SHEET = "BotSettings";

/**
 * Keeps a chat's local settings and its spreadsheet copy in step, and tracks
 * divergence in the chat's conflict flag.
 */
export class ConfigSyncService {
  constructor(
    private readonly configs: ChatConfigStore,
    private readonly defaults: DefaultSettingsLoader,
    private readonly sheets: SheetSync,
    private readonly log: Logger = rootLogger.child({ module: "config-sync" })
  ) {}

  /** Mirrors the chat's effective config to its settings sheet. */
  async pushToSheet(chatId: number): Promise<SyncStatus> {
    const config = this.configs.get(chatId);
    const url = readString(config, KEYS.gsheetUrl);
    if (!url) return "not_configured";

    const sheet = readString(config, KEYS.settingsSheetName);
    let ok = false;
    if (!sheet) {
      this.log.warn({ chatId }, "Sheet URL is set but the settings sheet name is empty");
    } else {
      try {
        ok = await this.sheets.writeSettings(url, sheet, config, this.defaults.load());
      } catch (e) {
        this.log.error({ err: e, chatId }, "Settings push threw");
      }
    }

    this.setConflict(chatId, !ok);
    return ok ? "synced" : "failed";
  }

  async applySetting(chatId: number, key: string, value: SettingValue): Promise<ApplyResult> {
    const saved = this.configs.setSetting(chatId, key, value);
    if (!saved.ok) return { saved: false, failure: saved };

    const sync = await this.pushToSheet(chatId);
    this.log.info({ chatId, key, sync }, "Setting changed");
    return { saved: true, sync, config: this.configs.get(chatId) };
  }

  /**
   * Pulls FAQs and settings from the sheet. Sheet values win over local
   * overrides; an unreadable FAQ sheet leaves the stored FAQs in place.
   */
  async refreshFromSheet(chatId: number): Promise<RefreshResult> {
    const config = this.configs.get(chatId);
    const url = readString(config, KEYS.gsheetUrl);
    if (!url) return { configured: false };

    let faqCount: number | null = null;
    const faqs = await this.readFaqs(url, readString(config, KEYS.faqSheetName) ?? DEFAULT_FAQ_SHEET);
    if (faqs === null) {
      this.log.warn({ chatId }, "FAQ sheet unreadable; keeping stored FAQs");
    } else if (this.configs.setSetting(chatId, KEYS.faqs, faqsToValue(faqs)).ok) {
      faqCount = faqs.length;
    }

    let settingsOk = false;
    const sheet = readString(config, KEYS.settingsSheetName) ?? DEFAULT_SETTINGS_SHEET;
    const remote = await this.readSettings(url, sheet);
    if (remote !== null) {
      const merged: SettingsRecord = {
        ...this.configs.getOverrides(chatId),
        ...remote,
        [KEYS.syncConflict]: false,
      };
      settingsOk = this.configs.update(chatId, merged).ok;
    }
    if (!settingsOk) this.setConflict(chatId, true);

    this.log.info({ chatId, faqCount, settingsOk }, "Refreshed from sheet");
    return { configured: true, faqCount, settingsOk };
  }

  /**
   * First-time hookup of a spreadsheet: imports FAQs, writes the settings
   * sheet, and only then records the URL.
   */
  async connectSheet(chatId: number, url: string): Promise<ConnectResult> {
    if (!isSheetUrl(url)) return { ok: false, reason: "bad_url" };

    const access = await this.sheets.checkAccess(url);
    if (!access.ok) return { ok: false, reason: "no_access", error: access.error };

    const config = this.configs.get(chatId);
    const faqs = await this.readFaqs(url, readString(config, KEYS.faqSheetName) ?? DEFAULT_FAQ_SHEET);
    const faqsSaved = this.configs.setSetting(chatId, KEYS.faqs, faqsToValue(faqs ?? []));
    if (!faqsSaved.ok) return { ok: false, reason: "save_failed", message: faqsSaved.message };

    const sheet = readString(config, KEYS.settingsSheetName) ?? DEFAULT_SETTINGS_SHEET;
    const toWrite = { ...this.configs.get(chatId), [KEYS.gsheetUrl]: url };
    let written = false;
    try {
      written = await this.sheets.writeSettings(url, sheet, toWrite, this.defaults.load());
    } catch (e) {
      this.log.error({ err: e, chatId }, "Settings sheet setup threw");
    }
    if (!written) {
      this.setConflict(chatId, true);
      return { ok: false, reason: "write_failed" };
    }

    const saved = this.configs.update(chatId, {
      ...this.configs.getOverrides(chatId),
      [KEYS.gsheetUrl]: url,
      [KEYS.syncConflict]: false,
    });
    if (!saved.ok) return { ok: false, reason: "save_failed", message: saved.message };

    this.log.info({ chatId, faqCount: faqs?.length ?? null }, "Spreadsheet connected");
    return { ok: true, faqs };
  }

  private async readFaqs(url: string, sheet: string): Promise<FaqPair[] | null> {
    try {
      return await this.sheets.readFaqs(url, sheet);
    } catch (e) {
      this.log.error({ err: e, sheet }, "FAQ read threw");
      return null;
    }
  }

  private async readSettings(url: string, sheet: string): Promise<SettingsRecord | null> {
    try {
      return await this.sheets.readSettings(url, sheet);
    } catch (e) {
      this.log.error({ err: e, sheet }, "Settings read threw");
      return null;
    }
  }

  private setConflict(chatId: number, conflict: boolean): void {
    const result = this.configs.setSetting(chatId, KEYS.syncConflict, conflict);
    if (!result.ok) {
      this.log.error({ chatId, conflict, reason: result.reason }, "Could not record sync conflict flag");
    }
  }
}
