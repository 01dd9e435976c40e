import type { FaqPair, SettingsRecord } from "../../state/settings";
import type { AccessCheck, SheetSync, SheetsApi } from "../sheets";

/** In-memory spreadsheets keyed by id, then worksheet title. */
export class FakeSheetsApi implements SheetsApi {
  readonly books = new Map<string, Map<string, string[][]>>();
  failWith: unknown = null;
  calls: string[] = [];

  book(id: string, sheets: Record<string, string[][]> = {}): this {
    this.books.set(id, new Map(Object.entries(sheets)));
    return this;
  }

  private open(id: string): Map<string, string[][]> {
    if (this.failWith !== null) throw this.failWith;
    const book = this.books.get(id);
    if (!book) throw Object.assign(new Error("Requested entity was not found."), { code: 404 });
    return book;
  }

  async listSheetTitles(id: string) {
    this.calls.push(`list ${id}`);
    return [...this.open(id).keys()];
  }

  async getValues(id: string, title: string) {
    this.calls.push(`get ${id}/${title}`);
    return this.open(id).get(title) ?? [];
  }

  async addSheet(id: string, title: string) {
    this.calls.push(`add ${id}/${title}`);
    this.open(id).set(title, []);
  }

  async clearSheet(id: string, title: string) {
    this.calls.push(`clear ${id}/${title}`);
    this.open(id).set(title, []);
  }

  async writeValues(id: string, title: string, rows: string[][]) {
    this.calls.push(`write ${id}/${title}`);
    this.open(id).set(title, rows);
  }
}

export const SHEET_URL = "https://docs.google.com/spreadsheets/d/sheet-1/edit";
export const SHEET_ID = "sheet-1";

/** Scripted {@link SheetSync}: set the fields to shape each answer. */
export class FakeSheetSync implements SheetSync {
  serviceAccountEmail: string | null = "bot@test-project.iam.gserviceaccount.com";
  access: AccessCheck = { ok: true };
  faqs: FaqPair[] | null = [];
  settings: SettingsRecord | null = {};
  writeOk: boolean | Error = true;
  writes: { url: string; sheet: string; config: SettingsRecord }[] = [];

  async checkAccess(): Promise<AccessCheck> {
    return this.access;
  }

  async readFaqs(): Promise<FaqPair[] | null> {
    return this.faqs;
  }

  async readSettings(): Promise<SettingsRecord | null> {
    return this.settings;
  }

  async writeSettings(url: string, sheet: string, config: SettingsRecord): Promise<boolean> {
    if (this.writeOk instanceof Error) throw this.writeOk;
    this.writes.push({ url, sheet, config });
    return this.writeOk;
  }
}
