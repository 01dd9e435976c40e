import { describe, it, expect } from "vitest";
import { commandArgs, isSheetUrl, parseMentionArgs, parseSetupPayload, setupPayload } from "../parse";

describe("commandArgs", () => {
  it("drops the command word and bot suffix", () => {
    expect(commandArgs("/seterror@helper_bot  Oops, try later ")).toBe("Oops, try later");
    expect(commandArgs("/toggleanonq")).toBe("");
  });
});

describe("parseMentionArgs", () => {
  it("splits keyword from an optional description", () => {
    expect(parseMentionArgs("mentor  Questions for mentors")).toEqual({
      keyword: "mentor",
      description: "Questions for mentors",
    });
    expect(parseMentionArgs("куратор")).toEqual({ keyword: "куратор", description: "" });
    expect(parseMentionArgs("   ")).toBeNull();
  });
});

describe("setup payload", () => {
  it("round-trips negative group ids", () => {
    expect(setupPayload(-1001234)).toBe("setfaqsheet_-1001234");
    expect(parseSetupPayload("setfaqsheet_-1001234")).toBe(-1001234);
  });

  it("rejects other payloads", () => {
    expect(parseSetupPayload("")).toBeNull();
    expect(parseSetupPayload("setfaqsheet_abc")).toBeNull();
    expect(parseSetupPayload("setfaqsheet_99999999999999999999")).toBeNull();
  });
});

describe("isSheetUrl", () => {
  it("accepts Google Sheets document links only", () => {
    expect(isSheetUrl(" https://docs.google.com/spreadsheets/d/abc_123-x/edit#gid=0 ")).toBe(true);
    expect(isSheetUrl("https://docs.google.com/document/d/abc/edit")).toBe(false);
    expect(isSheetUrl("http://docs.google.com/spreadsheets/d/abc")).toBe(false);
  });
});
