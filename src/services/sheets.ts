import fs from "node:fs";
import { google } from "googleapis";
import { z } from "zod";
import { logger as rootLogger, type Logger } from "../utils/logger";
import { errorMessage } from "../utils/errors";
import {
  parseFaqRows,
  parseSettingRows,
  settingsToRows,
  spreadsheetIdFromUrl,
} from "../utils/sheetRows";
import type { FaqPair, SettingsRecord } from "../state/settings";

export type AccessCheck = { ok: true } | { ok: false; error: string };

/** What the bot needs from a spreadsheet backend. */
export interface SheetSync {
  readonly serviceAccountEmail: string | null;
  checkAccess(url: string): Promise<AccessCheck>;
  readSettings(url: string, sheetName: string): Promise<SettingsRecord | null>;
  writeSettings(
    url: string,
    sheetName: string,
    config: SettingsRecord,
    defaultsForOrdering: SettingsRecord
  ): Promise<boolean>;
  readFaqs(url: string, sheetName: string): Promise<FaqPair[] | null>;
}

/** The handful of Sheets v4 calls used, so tests can stand in for Google. */
export interface SheetsApi {
  listSheetTitles(spreadsheetId: string): Promise<string[]>;
  getValues(spreadsheetId: string, sheetTitle: string): Promise<string[][]>;
  addSheet(spreadsheetId: string, sheetTitle: string): Promise<void>;
  clearSheet(spreadsheetId: string, sheetTitle: string): Promise<void>;
  writeValues(spreadsheetId: string, sheetTitle: string, rows: string[][]): Promise<void>;
}

const KeyFileSchema = z.object({ client_email: z.string() });

const quoteTitle = (title: string) => `'${title.replace(/'/g, "''")}'`;

function statusOf(e: unknown): number | undefined {
  if (typeof e !== "object" || e === null) return undefined;
  const code = "status" in e ? e.status : "code" in e ? e.code : undefined;
  const n = Number(code);
  return Number.isInteger(n) ? n : undefined;
}

/**
 * googleapis-backed {@link SheetsApi}. Returns `null` when the key file is
 * missing or unreadable; the bot then runs with sheet sync disabled.
 */
export function createGoogleSheetsApi(
  keyFilePath: string,
  log: Logger = rootLogger.child({ module: "sheets" })
): { api: SheetsApi; serviceAccountEmail: string } | null {
  let serviceAccountEmail: string;
  try {
    const parsed = KeyFileSchema.safeParse(JSON.parse(fs.readFileSync(keyFilePath, "utf8")));
    if (!parsed.success) {
      log.error({ path: keyFilePath }, "Service account key file has no client_email");
      return null;
    }
    serviceAccountEmail = parsed.data.client_email;
  } catch (e) {
    log.error({ err: e, path: keyFilePath }, "Service account key file could not be read; sheet sync disabled");
    return null;
  }

  const auth = new google.auth.GoogleAuth({
    keyFile: keyFilePath,
    scopes: ["https://www.googleapis.com/auth/spreadsheets"],
  });
  const sheets = google.sheets({ version: "v4", auth });

  const api: SheetsApi = {
    async listSheetTitles(spreadsheetId) {
      const meta = await sheets.spreadsheets.get({
        spreadsheetId,
        fields: "sheets.properties.title",
      });
      return (meta.data.sheets ?? []).flatMap((s) => {
        const title = s.properties?.title;
        return title ? [title] : [];
      });
    },
    async getValues(spreadsheetId, sheetTitle) {
      const res = await sheets.spreadsheets.values.get({
        spreadsheetId,
        range: quoteTitle(sheetTitle),
      });
      return (res.data.values ?? []).map((row: unknown[]) =>
        row.map((cell) => (cell === null || cell === undefined ? "" : String(cell)))
      );
    },
    async addSheet(spreadsheetId, sheetTitle) {
      await sheets.spreadsheets.batchUpdate({
        spreadsheetId,
        requestBody: { requests: [{ addSheet: { properties: { title: sheetTitle } } }] },
      });
    },
    async clearSheet(spreadsheetId, sheetTitle) {
      await sheets.spreadsheets.values.clear({ spreadsheetId, range: quoteTitle(sheetTitle) });
    },
    async writeValues(spreadsheetId, sheetTitle, rows) {
      await sheets.spreadsheets.values.update({
        spreadsheetId,
        range: `${quoteTitle(sheetTitle)}!A1`,
        valueInputOption: "RAW",
        requestBody: { values: rows },
      });
    },
  };
  return { api, serviceAccountEmail };
}

/**
 * Sheet-backed FAQ and settings sync. Every failure is logged and reported
 * as `null` / `false`; nothing here throws.
 */
export class GoogleSheetsSync implements SheetSync {
  constructor(
    private readonly api: SheetsApi | null,
    readonly serviceAccountEmail: string | null,
    private readonly log: Logger = rootLogger.child({ module: "sheets" })
  ) {}

  async checkAccess(url: string): Promise<AccessCheck> {
    const id = spreadsheetIdFromUrl(url);
    if (!id) return { ok: false, error: "That does not look like a Google Sheets link." };
    if (!this.api) return { ok: false, error: "Google Sheets access is not configured for this bot." };

    try {
      await this.api.listSheetTitles(id);
      return { ok: true };
    } catch (e) {
      this.log.warn({ err: e, spreadsheetId: id }, "Spreadsheet access check failed");
      const status = statusOf(e);
      if (status === 403) {
        const who = this.serviceAccountEmail ?? "the bot's service account";
        return {
          ok: false,
          error: `Permission denied. Share the sheet with ${who} as an Editor.`,
        };
      }
      if (status === 404) {
        return { ok: false, error: "Spreadsheet not found. Please check the link." };
      }
      return { ok: false, error: `Could not open the spreadsheet: ${errorMessage(e)}` };
    }
  }

  async readFaqs(url: string, sheetName: string): Promise<FaqPair[] | null> {
    const rows = await this.readSheet(url, sheetName);
    if (rows === null) return null;
    const faqs = parseFaqRows(rows);
    this.log.info({ sheet: sheetName, count: faqs.length }, "FAQs read");
    return faqs;
  }

  async readSettings(url: string, sheetName: string): Promise<SettingsRecord | null> {
    const rows = await this.readSheet(url, sheetName);
    if (rows === null) return null;
    const settings = parseSettingRows(rows);
    this.log.info({ sheet: sheetName, count: Object.keys(settings).length }, "Settings read");
    return settings;
  }

  async writeSettings(
    url: string,
    sheetName: string,
    config: SettingsRecord,
    defaultsForOrdering: SettingsRecord
  ): Promise<boolean> {
    const id = spreadsheetIdFromUrl(url);
    if (!id || !this.api) return false;
    const api = this.api;

    try {
      const titles = await api.listSheetTitles(id);
      if (!titles.includes(sheetName)) {
        this.log.info({ sheet: sheetName }, "Settings sheet missing; creating it");
        await api.addSheet(id, sheetName);
      }
      await api.clearSheet(id, sheetName);
      const rows = settingsToRows(config, defaultsForOrdering);
      await api.writeValues(id, sheetName, rows);
      this.log.info({ sheet: sheetName, rows: rows.length - 1 }, "Settings written");
      return true;
    } catch (e) {
      this.log.error({ err: e, sheet: sheetName }, "Writing settings sheet failed");
      return false;
    }
  }

  /** Raw cell grid, or null when the spreadsheet or worksheet can't be read. */
  private async readSheet(url: string, sheetName: string): Promise<string[][] | null> {
    const id = spreadsheetIdFromUrl(url);
    if (!id || !this.api) return null;
    const api = this.api;

    try {
      const titles = await api.listSheetTitles(id);
      if (!titles.includes(sheetName)) {
        this.log.warn({ sheet: sheetName }, "Worksheet not found");
        return null;
      }
      return await api.getValues(id, sheetName);
    } catch (e) {
      this.log.error({ err: e, sheet: sheetName }, "Reading worksheet failed");
      return null;
    }
  }
}
