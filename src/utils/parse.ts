import { spreadsheetIdFromUrl } from "./sheetRows";

const SETUP_PAYLOAD_RE = /^setfaqsheet_(-?\d+)$/;

export const setupPayload = (chatId: number) => `setfaqsheet_${chatId}`;

/** Text after the command word, e.g. "/seterror@my_bot  Oops " → "Oops". */
export function commandArgs(text: string): string {
  return (text || "").replace(/^\/\S+/, "").trim();
}

export function parseMentionArgs(args: string): { keyword: string; description: string } | null {
  const raw = args.trim();
  if (!raw) return null;
  const m = raw.match(/^(\S+)(?:\s+([\s\S]*))?$/);
  if (!m) return null;
  return { keyword: m[1], description: (m[2] ?? "").trim() };
}

/** Group chat id from a `/start setfaqsheet_<id>` deep link. */
export function parseSetupPayload(payload: string): number | null {
  const m = payload.trim().match(SETUP_PAYLOAD_RE);
  if (!m) return null;
  const id = Number(m[1]);
  return Number.isSafeInteger(id) ? id : null;
}

export function isSheetUrl(url: string): boolean {
  const s = url.trim();
  return s.startsWith("https://docs.google.com/spreadsheets/d/") && spreadsheetIdFromUrl(s) !== null;
}
