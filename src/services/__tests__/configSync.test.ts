import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { memoryStores } from "../../state/__tests__/helpers";
import { ConfigSyncService } from "../configSync";
import { FakeSheetSync, SHEET_URL } from "./fakes";

const DEFAULTS = {
  gsheet_url: null,
  settings_sheet_name: "BotSettings",
  faq_sheet_name: "FAQs",
  anonq_enabled: true,
  welcome_message: "Welcome, {username}!",
};
const CHAT = -100500;

let stores: ReturnType<typeof memoryStores>;
let sheets: FakeSheetSync;
let sync: ConfigSyncService;

beforeEach(() => {
  stores = memoryStores(DEFAULTS);
  sheets = new FakeSheetSync();
  sync = new ConfigSyncService(stores.configs, stores.defaults, sheets);
});

afterEach(() => stores.close());

const connected = () => stores.configs.setSetting(CHAT, "gsheet_url", SHEET_URL);

describe("ConfigSyncService.applySetting", () => {
  it("saves locally when no sheet is configured", async () => {
    const result = await sync.applySetting(CHAT, "welcome_message", "Hello there, {username}");

    expect(result.saved).toBe(true);
    if (result.saved) expect(result.sync).toBe("not_configured");
    expect(stores.configs.getOverrides(CHAT)).toEqual({ welcome_message: "Hello there, {username}" });
    expect(sheets.writes).toEqual([]);
  });

  it("pushes the effective config and clears the conflict flag", async () => {
    connected();
    stores.configs.setSetting(CHAT, "gsheet_sync_conflict", true);

    const result = await sync.applySetting(CHAT, "anonq_enabled", false);

    expect(result.saved && result.sync).toBe("synced");
    expect(sheets.writes).toHaveLength(1);
    expect(sheets.writes[0]?.sheet).toBe("BotSettings");
    expect(sheets.writes[0]?.config.anonq_enabled).toBe(false);
    expect(stores.configs.get(CHAT).gsheet_sync_conflict).toBe(false);
  });

  it("raises the conflict flag when the push fails or throws", async () => {
    connected();
    sheets.writeOk = false;
    expect(await sync.pushToSheet(CHAT)).toBe("failed");
    expect(stores.configs.get(CHAT).gsheet_sync_conflict).toBe(true);

    sheets.writeOk = new Error("network down");
    stores.configs.setSetting(CHAT, "gsheet_sync_conflict", false);
    expect(await sync.pushToSheet(CHAT)).toBe("failed");
    expect(stores.configs.get(CHAT).gsheet_sync_conflict).toBe(true);
  });

  it("counts a blank settings sheet name as a failed sync", async () => {
    connected();
    stores.configs.setSetting(CHAT, "settings_sheet_name", "  ");
    expect(await sync.pushToSheet(CHAT)).toBe("failed");
    expect(sheets.writes).toEqual([]);
    expect(stores.configs.get(CHAT).gsheet_sync_conflict).toBe(true);
  });

  it("reports a store failure without pushing", async () => {
    const result = await sync.applySetting(0.5, "k", 1);
    expect(result.saved).toBe(false);
    if (!result.saved) expect(result.failure.reason).toBe("invalid_id");
    expect(sheets.writes).toEqual([]);
  });
});

describe("ConfigSyncService.refreshFromSheet", () => {
  it("needs a sheet URL", async () => {
    expect(await sync.refreshFromSheet(CHAT)).toEqual({ configured: false });
  });

  it("stores FAQs and lets sheet values win without materializing defaults", async () => {
    connected();
    stores.configs.setSetting(CHAT, "welcome_message", "local welcome");
    stores.configs.setSetting(CHAT, "gsheet_sync_conflict", true);
    sheets.faqs = [["Where?", "Here"]];
    sheets.settings = { welcome_message: "sheet welcome", custom: 3 };

    expect(await sync.refreshFromSheet(CHAT)).toEqual({ configured: true, faqCount: 1, settingsOk: true });
    expect(stores.configs.getOverrides(CHAT)).toEqual({
      gsheet_url: SHEET_URL,
      welcome_message: "sheet welcome",
      gsheet_sync_conflict: false,
      faqs_list: [["Where?", "Here"]],
      custom: 3,
    });
  });

  it("keeps stored FAQs when the FAQ sheet is unreadable and flags unreadable settings", async () => {
    connected();
    stores.configs.setSetting(CHAT, "faqs_list", [["Old?", "Yes"]]);
    sheets.faqs = null;
    sheets.settings = null;

    expect(await sync.refreshFromSheet(CHAT)).toEqual({ configured: true, faqCount: null, settingsOk: false });
    expect(stores.configs.get(CHAT).faqs_list).toEqual([["Old?", "Yes"]]);
    expect(stores.configs.get(CHAT).gsheet_sync_conflict).toBe(true);
  });
});

describe("ConfigSyncService.connectSheet", () => {
  it("rejects links that are not spreadsheets", async () => {
    expect(await sync.connectSheet(CHAT, "https://example.com/x")).toEqual({ ok: false, reason: "bad_url" });
  });

  it("passes on the access error", async () => {
    sheets.access = { ok: false, error: "Permission denied." };
    expect(await sync.connectSheet(CHAT, SHEET_URL)).toEqual({
      ok: false,
      reason: "no_access",
      error: "Permission denied.",
    });
    expect(stores.configs.getOverrides(CHAT)).toEqual({});
  });

  it("imports FAQs, writes the settings sheet and records the URL", async () => {
    sheets.faqs = [["Q1", "A1"], ["Q2", "A2"]];

    expect(await sync.connectSheet(CHAT, SHEET_URL)).toEqual({
      ok: true,
      faqs: [["Q1", "A1"], ["Q2", "A2"]],
    });
    expect(sheets.writes[0]?.config.gsheet_url).toBe(SHEET_URL);
    expect(stores.configs.getOverrides(CHAT)).toEqual({
      faqs_list: [["Q1", "A1"], ["Q2", "A2"]],
      gsheet_url: SHEET_URL,
      gsheet_sync_conflict: false,
    });
  });

  it("stores an empty FAQ list when the FAQ sheet is unreadable", async () => {
    sheets.faqs = null;
    expect(await sync.connectSheet(CHAT, SHEET_URL)).toEqual({ ok: true, faqs: null });
    expect(stores.configs.get(CHAT).faqs_list).toEqual([]);
  });

  it("does not record the URL when the settings sheet cannot be written", async () => {
    sheets.writeOk = false;
    expect(await sync.connectSheet(CHAT, SHEET_URL)).toEqual({ ok: false, reason: "write_failed" });
    expect(stores.configs.get(CHAT).gsheet_url).toBeNull();
    expect(stores.configs.get(CHAT).gsheet_sync_conflict).toBe(true);
  });
});
