import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";

import type { TelegramUpdate } from "./bot";
import { logger } from "./utils/logger";
import { errorMessage } from "./utils/errors";

export type ServerDeps = {
  mode: "polling" | "webhook";
  knownChatCount: () => number;
  webhook?: {
    path: string;
    handleUpdate: (update: TelegramUpdate) => Promise<void>;
  };
};

function isTelegramUpdate(body: unknown): body is TelegramUpdate {
  return (
    typeof body === "object" &&
    body !== null &&
    "update_id" in body &&
    typeof body.update_id === "number"
  );
}

export async function buildServer(deps: ServerDeps) {
  const app = Fastify({ logger: logger.child({ module: "http" }) });

  await app.register(cors, { origin: true });
  await app.register(helmet);

  app.get("/health", async () => ({
    ok: true,
    mode: deps.mode,
    chats: deps.knownChatCount(),
  }));

  const webhook = deps.webhook;
  if (webhook) {
    app.post(webhook.path, async (req, reply) => {
      if (!isTelegramUpdate(req.body)) {
        reply.code(400);
        return { ok: false, error: "Invalid update" };
      }
      try {
        await webhook.handleUpdate(req.body);
        return { ok: true };
      } catch (e) {
        req.log.error({ err: e }, "handleUpdate failed");
        reply.code(500);
        return { ok: false, error: errorMessage(e) };
      }
    });
  }

  return app;
}
