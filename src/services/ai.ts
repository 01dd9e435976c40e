import {
  HumanMessage,
  SystemMessage,
  type BaseMessage,
} from "@langchain/core/messages";
import { StringOutputParser } from "@langchain/core/output_parsers";
import { PromptTemplate } from "@langchain/core/prompts";
import type { Runnable } from "@langchain/core/runnables";
import { ChatOpenAI } from "@langchain/openai";
import { ChatGoogleGenerativeAI } from "@langchain/google-genai";
import type { AppConfig } from "../config";
import { logger as rootLogger, type Logger } from "../utils/logger";
import { errorMessage } from "../utils/errors";
import type { PromptLibrary, PromptName } from "./prompts";

export type ProviderName = "openai" | "gemini";

/** Builds a chat model at the given temperature. */
export type ChatModelFactory = (temperature: number) => Runnable<BaseMessage[], BaseMessage>;
export type Providers = Partial<Record<ProviderName, ChatModelFactory>>;

export type ChatRequest = {
  personality: string;
  message: string;
  authorName: string;
  history?: string;
  replyTo?: { author: string; text: string };
};

export interface ResponseGenerator {
  generateChatResponse(req: ChatRequest): Promise<string | null>;
  /** 1-based index into the enumerated questions; 0 when nothing matches. */
  findFaqMatchIndex(query: string, enumeratedQuestions: string): Promise<number>;
  summarize(text: string): Promise<string | null>;
  isTextAppropriate(text: string): Promise<boolean>;
}

export function createProviders(ai: AppConfig["ai"]): Providers {
  const providers: Providers = {};
  if (ai.openaiApiKey) {
    const apiKey = ai.openaiApiKey;
    providers.openai = (temperature) =>
      new ChatOpenAI({
        model: ai.openaiModel,
        temperature,
        apiKey,
        configuration: ai.openaiBaseUrl ? { baseURL: ai.openaiBaseUrl } : undefined,
      });
  }
  // LangChain uses GOOGLE_API_KEY (GEMINI_API_KEY is mapped onto it in config)
  if (ai.googleApiKey) {
    const apiKey = ai.googleApiKey;
    providers.gemini = (temperature) =>
      new ChatGoogleGenerativeAI({ model: ai.geminiModel, temperature, apiKey });
  }
  return providers;
}

export class LlmService implements ResponseGenerator {
  private readonly order: ProviderName[];

  constructor(
    private readonly prompts: PromptLibrary,
    private readonly providers: Providers,
    preference: AppConfig["ai"]["provider"] = "auto",
    private readonly log: Logger = rootLogger.child({ module: "llm" })
  ) {
    const wanted: ProviderName[] = preference === "auto" ? ["openai", "gemini"] : [preference];
    this.order = wanted.filter((p) => providers[p] !== undefined);
    if (this.order.length === 0) {
      this.log.error({ preference }, "No language model provider is configured; replies are disabled");
    }
  }

  async generateChatResponse(req: ChatRequest): Promise<string | null> {
    const message = await this.fill("message", { author: req.authorName, message: req.message });
    if (message === null) return null;

    const system = [req.personality];
    if (req.replyTo) {
      const reply = await this.fill("reply", { author: req.replyTo.author, reply: req.replyTo.text });
      if (reply !== null) system.push(reply);
    }

    const messages: BaseMessage[] = [new SystemMessage(system.join("\n\n"))];
    if (req.history) {
      const history = await this.fill("history", { history: req.history });
      if (history !== null) messages.push(new HumanMessage(history));
    }
    messages.push(new HumanMessage(message));

    return this.invoke(messages, 0.7, "chat");
  }

  async findFaqMatchIndex(query: string, enumeratedQuestions: string): Promise<number> {
    const system = await this.fill("search", { enumerated_questions: enumeratedQuestions });
    if (system === null) return 0;

    const answer = await this.invoke(
      [
        new SystemMessage(system),
        new HumanMessage(query),
      ],
      0,
      "search"
    );
    if (answer === null) return 0;
    if (!/^\d+$/.test(answer)) {
      this.log.warn({ answer }, "FAQ match answer is not a number");
      return 0;
    }
    return Number(answer);
  }

  async summarize(text: string): Promise<string | null> {
    const tpl = this.prompts.load("summarize");
    if (!tpl) return null;
    return this.invoke([new SystemMessage(tpl), new HumanMessage(text)], 0.3, "summarize");
  }

  async isTextAppropriate(text: string): Promise<boolean> {
    const tpl = this.prompts.load("filter");
    if (!tpl) return false;

    const answer = await this.invoke([new SystemMessage(tpl), new HumanMessage(text)], 0, "filter");
    if (answer === "1") return true;
    if (answer !== "0") this.log.warn({ answer }, "Unexpected filter answer; treating text as inappropriate");
    return false;
  }

  /** Formats a template file; values are inserted once and never re-parsed. */
  private async fill(name: PromptName, vars: Record<string, string>): Promise<string | null> {
    const tpl = this.prompts.load(name);
    if (tpl === null) return null;
    try {
      return await PromptTemplate.fromTemplate<Record<string, string>>(tpl).format(vars);
    } catch (e) {
      this.log.error({ err: errorMessage(e), prompt: name }, "Prompt template could not be formatted");
      return null;
    }
  }

  /** Tries providers in order; the first non-empty answer wins. */
  private async invoke(
    messages: BaseMessage[],
    temperature: number,
    purpose: string
  ): Promise<string | null> {
    for (const name of this.order) {
      const factory = this.providers[name];
      if (!factory) continue;
      try {
        const t0 = Date.now();
        const text = (await factory(temperature).pipe(new StringOutputParser()).invoke(messages)).trim();
        this.log.debug({ provider: name, purpose, latencyMs: Date.now() - t0 }, "model answered");
        if (text) return text;
        this.log.warn({ provider: name, purpose }, "Model returned an empty answer");
      } catch (e) {
        this.log.warn({ provider: name, purpose, err: errorMessage(e) }, "Model call failed");
      }
    }
    return null;
  }
}
