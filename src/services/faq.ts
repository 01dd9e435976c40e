import { logger as rootLogger, type Logger } from "../utils/logger";
import { removeEmojis } from "../utils/text";
import {
  KEYS,
  readFaqs,
  readMentions,
  readString,
  readStringList,
  type ChatConfig,
  type FaqPair,
} from "../state/settings";
import type { ResponseGenerator } from "./ai";

export const FALLBACK_PERSONALITY = "I'm here to help. How can I assist you?";
export const FALLBACK_REPLY =
  "I'm not sure how to respond to that right now. You can try asking differently.";

export function enumerateQuestions(faqs: FaqPair[]): string {
  return faqs.map(([q], i) => `${i + 1}. ${q}`).join("\n");
}

const escapeRegex = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/** Whole-word, case-insensitive match; works for Cyrillic keywords too. */
export function containsKeyword(text: string, keyword: string): boolean {
  const kw = keyword.trim();
  if (!kw) return false;
  return new RegExp(`(^|[^\\p{L}\\p{N}_])${escapeRegex(kw)}($|[^\\p{L}\\p{N}_])`, "iu").test(text);
}

/** Every trigger keyword configured for the chat: built-in `mentions` and admin-added ones. */
export function triggerKeywords(config: ChatConfig): string[] {
  return [...readStringList(config, KEYS.mentions), ...readMentions(config).map((m) => m.keyword)];
}

export type AddressCheck = {
  text: string;
  botUsername?: string;
  keywords: string[];
  repliesToBot: boolean;
};

export function isAddressedToBot(check: AddressCheck): boolean {
  if (check.repliesToBot) return true;
  const text = check.text.toLowerCase();
  if (check.botUsername && text.includes(`@${check.botUsername.toLowerCase()}`)) return true;
  return check.keywords.some((kw) => containsKeyword(check.text, kw));
}

export type FaqAnswer = { source: "faq" | "chat" | "fallback"; text: string };

/** FAQ lookup first, then a free-form reply in the chat's personality, then a fixed fallback. */
export class FaqResponder {
  constructor(
    private readonly generator: ResponseGenerator,
    private readonly log: Logger = rootLogger.child({ module: "faq" })
  ) {}

  async answer(
    config: ChatConfig,
    question: { text: string; authorName: string; replyTo?: { author: string; text: string } }
  ): Promise<FaqAnswer> {
    const faqs = readFaqs(config);
    if (faqs.length > 0) {
      try {
        const idx = await this.generator.findFaqMatchIndex(question.text, enumerateQuestions(faqs));
        const hit = faqs[idx - 1];
        if (idx >= 1 && hit) {
          const text = removeEmojis(hit[1]);
          if (text) return { source: "faq", text };
        }
      } catch (e) {
        this.log.error({ err: e }, "FAQ lookup failed");
      }
    }

    const personality = readString(config, KEYS.personalityPrompt) ?? FALLBACK_PERSONALITY;
    try {
      const reply = await this.generator.generateChatResponse({
        personality,
        message: question.text,
        authorName: question.authorName,
        replyTo: question.replyTo,
      });
      const text = reply ? removeEmojis(reply) : "";
      if (text) return { source: "chat", text };
    } catch (e) {
      this.log.error({ err: e }, "Chat reply failed");
    }
    return { source: "fallback", text: FALLBACK_REPLY };
  }
}
