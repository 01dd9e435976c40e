import {
  LOCAL_ONLY_KEYS,
  isUnsafeKey,
  SettingValueSchema,
  type FaqPair,
  type SettingValue,
  type SettingsRecord,
} from "../state/settings";

export const SETTINGS_HEADER = ["Setting Key", "Setting Value"] as const;

const FAQ_HEADER_CELLS = new Set(["question", "вопрос"]);
const SETTINGS_HEADER_CELLS = new Set(["setting", "key", "setting key"]);

const SHEET_ID_RE = /\/spreadsheets\/d\/([a-zA-Z0-9_-]+)/;

export function spreadsheetIdFromUrl(url: string): string | null {
  const m = url.match(SHEET_ID_RE);
  return m ? m[1] : null;
}

const headCell = (rows: string[][]) => (rows[0]?.[0] ?? "").trim().toLowerCase();

/** First two columns as question/answer; rows missing either are dropped. */
export function parseFaqRows(rows: string[][]): FaqPair[] {
  const start = FAQ_HEADER_CELLS.has(headCell(rows)) ? 1 : 0;
  const faqs: FaqPair[] = [];
  for (const row of rows.slice(start)) {
    const question = (row[0] ?? "").trim();
    const answer = (row[1] ?? "").trim();
    if (question && answer) faqs.push([question, answer]);
  }
  return faqs;
}

/**
 * Best-effort typing of a cell written by a human: booleans, integers,
 * decimals and JSON lists/objects; anything else stays text.
 */
export function coerceCell(raw: string): SettingValue {
  const s = raw.trim();
  const lower = s.toLowerCase();
  if (lower === "true") return true;
  if (lower === "false") return false;
  if (/^\d+$/.test(s)) {
    const n = Number(s);
    return Number.isSafeInteger(n) ? n : s;
  }
  if (/^\d+\.\d+$/.test(s)) {
    const n = Number(s);
    return Number.isFinite(n) ? n : s;
  }
  if (s.startsWith("[") || s.startsWith("{")) {
    try {
      const parsed = SettingValueSchema.safeParse(JSON.parse(s));
      if (parsed.success) return parsed.data;
    } catch {
      // not JSON after all; keep the text
    }
  }
  return s;
}

export function parseSettingRows(rows: string[][]): SettingsRecord {
  const start = SETTINGS_HEADER_CELLS.has(headCell(rows)) ? 1 : 0;
  const settings: SettingsRecord = {};
  for (const row of rows.slice(start)) {
    const key = (row[0] ?? "").trim();
    if (!key || LOCAL_ONLY_KEYS.has(key) || isUnsafeKey(key)) continue;
    // Sheets drops trailing empty cells, so a blanked value arrives as a one-cell row.
    settings[key] = coerceCell(row[1] ?? "");
  }
  return settings;
}

export function cellText(value: SettingValue | undefined): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

/** Header, then every default key in defaults order, then keys the defaults do not know. */
export function settingsToRows(config: SettingsRecord, defaults: SettingsRecord): string[][] {
  const rows: string[][] = [[...SETTINGS_HEADER]];
  for (const key of Object.keys(defaults)) {
    if (LOCAL_ONLY_KEYS.has(key)) continue;
    rows.push([key, cellText(key in config ? config[key] : defaults[key])]);
  }
  for (const key of Object.keys(config)) {
    if (key in defaults || LOCAL_ONLY_KEYS.has(key)) continue;
    rows.push([key, cellText(config[key])]);
  }
  return rows;
}
