import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ChatConfigStore } from "../chatConfig";
import { DefaultSettingsLoader } from "../defaults";
import { KvStore } from "../kvStore";
import type { SettingsRecord } from "../settings";
import { UserGroupLinkStore } from "../userGroupLinks";

export function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "faq-bot-"));
}

export function writeJson(dir: string, name: string, value: unknown): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, JSON.stringify(value));
  return file;
}

/** Fresh in-memory stores over the given defaults. Call `close` when done. */
export function memoryStores(defaults: SettingsRecord) {
  const defaultsLoader = new DefaultSettingsLoader(writeJson(tempDir(), "defaults.json", defaults));
  const kv = new KvStore(":memory:");
  return {
    kv,
    defaults: defaultsLoader,
    configs: new ChatConfigStore(kv, defaultsLoader),
    links: new UserGroupLinkStore(kv),
    close: () => kv.close(),
  };
}
