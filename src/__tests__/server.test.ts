import { afterEach, describe, it, expect } from "vitest";
import { buildServer } from "../server";
import type { TelegramUpdate } from "../bot";

let app: Awaited<ReturnType<typeof buildServer>> | undefined;

afterEach(async () => {
  await app?.close();
  app = undefined;
});

describe("buildServer", () => {
  it("reports mode and known chat count on /health", async () => {
    const server = await buildServer({ mode: "polling", knownChatCount: () => 3 });
    app = server;
    const res = await server.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, mode: "polling", chats: 3 });
  });

  it("has no webhook route in polling mode", async () => {
    const server = await buildServer({ mode: "polling", knownChatCount: () => 0 });
    app = server;
    const res = await server.inject({ method: "POST", url: "/tg/test-token", payload: { update_id: 1 } });
    expect(res.statusCode).toBe(404);
  });

  it("passes valid updates to the bot and rejects other bodies", async () => {
    const received: TelegramUpdate[] = [];
    const server = await buildServer({
      mode: "webhook",
      knownChatCount: () => 0,
      webhook: {
        path: "/tg/test-token",
        handleUpdate: async (update) => {
          received.push(update);
        },
      },
    });
    app = server;

    const ok = await server.inject({ method: "POST", url: "/tg/test-token", payload: { update_id: 7 } });
    expect(ok.statusCode).toBe(200);
    expect(ok.json()).toEqual({ ok: true });
    expect(received.map((u) => u.update_id)).toEqual([7]);

    const bad = await server.inject({ method: "POST", url: "/tg/test-token", payload: { hello: "world" } });
    expect(bad.statusCode).toBe(400);
    expect(bad.json()).toEqual({ ok: false, error: "Invalid update" });
  });

  it("answers 500 when the bot fails on an update", async () => {
    const server = await buildServer({
      mode: "webhook",
      knownChatCount: () => 0,
      webhook: {
        path: "/tg/test-token",
        handleUpdate: async () => {
          throw new Error("boom");
        },
      },
    });
    app = server;
    const res = await server.inject({ method: "POST", url: "/tg/test-token", payload: { update_id: 1 } });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ ok: false, error: "boom" });
  });
});
