import fs from "node:fs";
import { logger as rootLogger, type Logger } from "../utils/logger";
import { SettingsRecordSchema, type SettingsRecord } from "./settings";

/**
 * Reads the hand-edited default settings file once and hands out copies.
 *
 * A missing or malformed file is not fatal for the process: the failure is
 * logged and an empty mapping is cached, so every chat runs without defaults
 * until the next restart.
 */
export class DefaultSettingsLoader {
  private cache: SettingsRecord | null = null;

  constructor(
    private readonly filePath: string,
    private readonly log: Logger = rootLogger.child({ module: "defaults" })
  ) {}

  load(): SettingsRecord {
    if (this.cache === null) this.cache = this.readFile();
    return structuredClone(this.cache);
  }

  private readFile(): SettingsRecord {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, "utf8");
    } catch (e) {
      this.log.fatal({ err: e, path: this.filePath }, "Default settings file could not be read");
      return {};
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      this.log.fatal({ err: e, path: this.filePath }, "Default settings file is not valid JSON");
      return {};
    }

    const parsed = SettingsRecordSchema.safeParse(json);
    if (!parsed.success) {
      this.log.fatal(
        { path: this.filePath, issues: parsed.error.issues.slice(0, 5) },
        "Default settings file must be a JSON object"
      );
      return {};
    }

    this.log.info(
      { path: this.filePath, keys: Object.keys(parsed.data).length },
      "Default settings loaded"
    );
    return parsed.data;
  }
}
