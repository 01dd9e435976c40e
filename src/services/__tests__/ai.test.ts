import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { AIMessage, type BaseMessage } from "@langchain/core/messages";
import { RunnableLambda } from "@langchain/core/runnables";
import { beforeEach, describe, it, expect } from "vitest";
import { LlmService, type ChatModelFactory } from "../ai";
import { PromptLibrary } from "../prompts";

const TEMPLATES: Record<string, string> = {
  search: "Questions:\n{enumerated_questions}",
  message: "{author} wrote:\n{message}",
  reply: "In reply to {author}: {reply}",
  history: "History:\n{history}",
  summarize: "Summarize.",
  filter: "Reply 1 or 0.",
};

let promptsDir: string;

beforeEach(() => {
  promptsDir = fs.mkdtempSync(path.join(os.tmpdir(), "prompts-"));
  for (const [name, text] of Object.entries(TEMPLATES)) {
    fs.writeFileSync(path.join(promptsDir, `${name}.txt`), text);
  }
});

type Call = { temperature: number; messages: BaseMessage[] };

function fakeModel(answer: string | Error, calls: Call[] = []): ChatModelFactory {
  return (temperature) =>
    RunnableLambda.from(async (messages: BaseMessage[]) => {
      calls.push({ temperature, messages });
      if (answer instanceof Error) throw answer;
      return new AIMessage(answer);
    });
}

const contents = (call: Call | undefined) => (call?.messages ?? []).map((m) => [m._getType(), m.content]);

describe("PromptLibrary", () => {
  it("caches templates after the first read", () => {
    const lib = new PromptLibrary(promptsDir);
    expect(lib.load("filter")).toBe("Reply 1 or 0.");
    fs.writeFileSync(path.join(promptsDir, "filter.txt"), "changed");
    expect(lib.load("filter")).toBe("Reply 1 or 0.");
  });

  it("strips a byte-order mark", () => {
    fs.writeFileSync(path.join(promptsDir, "summarize.txt"), "\uFEFFShort please.");
    expect(new PromptLibrary(promptsDir).load("summarize")).toBe("Short please.");
  });

  it("returns null for a missing template", () => {
    fs.rmSync(path.join(promptsDir, "reply.txt"));
    expect(new PromptLibrary(promptsDir).load("reply")).toBeNull();
  });
});

describe("LlmService", () => {
  it("builds the chat prompt from personality, reply context, history and message", async () => {
    const calls: Call[] = [];
    const llm = new LlmService(new PromptLibrary(promptsDir), { openai: fakeModel(" Hello! ", calls) });

    const answer = await llm.generateChatResponse({
      personality: "Be kind.",
      message: "hi there",
      authorName: "Ann",
      history: "Bob: yo",
      replyTo: { author: "Bob", text: "earlier" },
    });

    expect(answer).toBe("Hello!");
    expect(calls[0]?.temperature).toBe(0.7);
    expect(contents(calls[0])).toEqual([
      ["system", "Be kind.\n\nIn reply to Bob: earlier"],
      ["human", "History:\nBob: yo"],
      ["human", "Ann wrote:\nhi there"],
    ]);
  });

  it("inserts braces from user text literally", async () => {
    const calls: Call[] = [];
    const llm = new LlmService(new PromptLibrary(promptsDir), { openai: fakeModel("ok", calls) });

    await llm.generateChatResponse({ personality: "Be kind.", message: "hi", authorName: "{message}" });

    expect(contents(calls[0])).toEqual([
      ["system", "Be kind."],
      ["human", "{message} wrote:\nhi"],
    ]);
  });

  it("skips the model when a template has a variable it is not given", async () => {
    fs.writeFileSync(path.join(promptsDir, "message.txt"), "{author} asks {topic}");
    const calls: Call[] = [];
    const llm = new LlmService(new PromptLibrary(promptsDir), { openai: fakeModel("ok", calls) });

    expect(await llm.generateChatResponse({ personality: "p", message: "m", authorName: "Ann" })).toBeNull();
    expect(calls).toEqual([]);
  });

  it("falls back to Gemini when OpenAI fails in auto mode", async () => {
    const llm = new LlmService(new PromptLibrary(promptsDir), {
      openai: fakeModel(new Error("429 quota")),
      gemini: fakeModel("from gemini"),
    });
    expect(await llm.summarize("long text")).toBe("from gemini");
  });

  it("uses only the forced provider", async () => {
    const openaiCalls: Call[] = [];
    const llm = new LlmService(
      new PromptLibrary(promptsDir),
      { openai: fakeModel("openai", openaiCalls), gemini: fakeModel("gemini") },
      "gemini"
    );
    expect(await llm.summarize("text")).toBe("gemini");
    expect(openaiCalls).toEqual([]);
  });

  it("returns null when every provider fails or none is configured", async () => {
    const failing = new LlmService(new PromptLibrary(promptsDir), { openai: fakeModel(new Error("down")) });
    expect(await failing.summarize("text")).toBeNull();
    expect(await new LlmService(new PromptLibrary(promptsDir), {}).summarize("text")).toBeNull();
  });

  it("parses the FAQ match index", async () => {
    const calls: Call[] = [];
    const lib = new PromptLibrary(promptsDir);
    const llm = new LlmService(lib, { openai: fakeModel("2", calls) });

    expect(await llm.findFaqMatchIndex("when do you open?", "1. Where?\n2. When?")).toBe(2);
    expect(calls[0]?.temperature).toBe(0);
    expect(contents(calls[0])).toEqual([
      ["system", "Questions:\n1. Where?\n2. When?"],
      ["human", "when do you open?"],
    ]);
    expect(await new LlmService(lib, { openai: fakeModel("Question 2") }).findFaqMatchIndex("q", "1. a")).toBe(0);
  });

  it("passes the filter only on an exact 1", async () => {
    const lib = new PromptLibrary(promptsDir);
    expect(await new LlmService(lib, { openai: fakeModel("1") }).isTextAppropriate("ok?")).toBe(true);
    expect(await new LlmService(lib, { openai: fakeModel("0") }).isTextAppropriate("bad")).toBe(false);
    expect(await new LlmService(lib, { openai: fakeModel("yes") }).isTextAppropriate("hmm")).toBe(false);
  });

  it("treats a missing filter template as inappropriate", async () => {
    fs.rmSync(path.join(promptsDir, "filter.txt"));
    const llm = new LlmService(new PromptLibrary(promptsDir), { openai: fakeModel("1") });
    expect(await llm.isTextAppropriate("anything")).toBe(false);
  });
});
