import { logger } from "./logger";

export type InteractionType =
  | "start"
  | "help"
  | "faq"
  | "chat"
  | "summarize"
  | "anon"
  | "link"
  | "welcome"
  | "admin";

const interactions = logger.child({ module: "interactions" });

export function logInteraction(params: {
  chatId: number;
  type: InteractionType;
  input: string;
  outcome?: string;
  latencyMs?: number;
  userId?: number;
}) {
  interactions.info({
    chatId: params.chatId,
    userId: params.userId,
    type: params.type,
    input: params.input.slice(0, 30) + (params.input.length > 30 ? "..." : ""),
    outcome: params.outcome ?? "ok",
    latencyMs: params.latencyMs,
  }, "interaction");
}
