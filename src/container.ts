import type { AppConfig } from "./config";
import { KvStore } from "./state/kvStore";
import { DefaultSettingsLoader } from "./state/defaults";
import { ChatConfigStore } from "./state/chatConfig";
import { UserGroupLinkStore } from "./state/userGroupLinks";
import { PromptLibrary } from "./services/prompts";
import { LlmService, createProviders } from "./services/ai";
import { GoogleSheetsSync, createGoogleSheetsApi } from "./services/sheets";
import { ConfigSyncService } from "./services/configSync";
import { FaqResponder } from "./services/faq";
import type { BotServices } from "./bot";

export type Services = BotServices & {
  defaults: DefaultSettingsLoader;
  close(): void;
};

/** Wires the stores and services the bot and the HTTP server share. */
export function createServices(config: AppConfig): Services {
  const kv = new KvStore(config.paths.store);
  const defaults = new DefaultSettingsLoader(config.paths.defaultSettings);
  // Read before the first request so later edits to the file have no effect.
  defaults.load();
  const configs = new ChatConfigStore(kv, defaults);
  const links = new UserGroupLinkStore(kv);

  const google = createGoogleSheetsApi(config.paths.gspreadKey);
  const sheets = new GoogleSheetsSync(google?.api ?? null, google?.serviceAccountEmail ?? null);

  const generator = new LlmService(
    new PromptLibrary(config.paths.prompts),
    createProviders(config.ai),
    config.ai.provider
  );

  return {
    configs,
    links,
    defaults,
    sheets,
    sync: new ConfigSyncService(configs, defaults, sheets),
    generator,
    responder: new FaqResponder(generator),
    maxMentionsPerChat: config.maxMentionsPerChat,
    bossId: config.bossId,
    close: () => kv.close(),
  };
}
