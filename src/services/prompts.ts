import fs from "node:fs";
import path from "node:path";
import { logger as rootLogger, type Logger } from "../utils/logger";

export type PromptName = "search" | "message" | "reply" | "history" | "summarize" | "filter";

export class PromptLibrary {
  private cache = new Map<PromptName, string>();

  constructor(
    private readonly dir: string,
    private readonly log: Logger = rootLogger.child({ module: "prompts" })
  ) {
    if (!fs.existsSync(dir)) {
      this.log.fatal({ dir }, "Prompts directory is missing; model features will not work");
    }
  }

  load(name: PromptName): string | null {
    const hit = this.cache.get(name);
    if (hit !== undefined) return hit;

    const file = path.join(this.dir, `${name}.txt`);
    try {
      const text = fs.readFileSync(file, "utf8").replace(/^\uFEFF/, "");
      this.cache.set(name, text);
      return text;
    } catch (e) {
      this.log.error({ err: e, file }, "Prompt template could not be read");
      return null;
    }
  }
}
