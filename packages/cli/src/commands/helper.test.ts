import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { CredentialStore } from "../credentials/store";
import type { Prompter } from "../ui/prompt";
import { collectHelperAnswers, promptTimestamp, promptYesNo, selectCredentials } from "./helper";

function scriptedPrompter(answers: string[]) {
  const queue = [...answers];
  const asked: string[] = [];
  const secrets: string[] = [];
  const said: string[] = [];

  const ask = async (question: string): Promise<string> => {
    asked.push(question);
    const next = queue.shift();
    if (next === undefined) throw new Error(`No scripted answer for ${JSON.stringify(question)}`);
    return next;
  };

  const prompter: Prompter = {
    ask,
    askSecret: async (question) => {
      secrets.push(question);
      return ask(question);
    },
    say: (message = "") => {
      said.push(message);
    },
    close: () => undefined,
  };
  return { prompter, asked, secrets, said, remaining: () => queue.length };
}

describe("selectCredentials", () => {
  let dir: string;
  let store: CredentialStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "contestcal-helper-"));
    store = new CredentialStore(join(dir, "clist_credentials.json"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("asks for new credentials when none are saved and saves them", async () => {
    const { prompter, asked, secrets, said } = scriptedPrompter(["", "alice", "test-key"]);

    await expect(selectCredentials(prompter, store)).resolves.toEqual({ username: "alice", apiKey: "test-key" });

    expect(said).toContain("No saved credentials found. Please enter them now.");
    expect(said).toContain("Value cannot be empty. Please try again.");
    expect(asked).toEqual(["CLIST username: ", "CLIST username: ", "CLIST API key: "]);
    expect(secrets).toEqual(["CLIST API key: "]);
    expect(JSON.parse(await readFile(store.path, "utf8"))).toEqual({ username: "alice", api_key: "test-key" });
  });

  it("uses saved credentials by default", async () => {
    await store.save({ username: "alice", apiKey: "test-key" });
    const { prompter, asked, said } = scriptedPrompter([""]);

    await expect(selectCredentials(prompter, store)).resolves.toEqual({ username: "alice", apiKey: "test-key" });

    expect(said).toContain("  Username: alice");
    expect(asked).toEqual(["Enter choice [1]: "]);
  });

  it("deletes saved credentials and asks again when choosing new ones", async () => {
    await store.save({ username: "alice", apiKey: "test-key" });
    const { prompter, asked, said } = scriptedPrompter(["3", "2", "bob", "other-test-key"]);

    await expect(selectCredentials(prompter, store)).resolves.toEqual({
      username: "bob",
      apiKey: "other-test-key",
    });

    expect(said).toContain("Invalid choice, please try again.");
    expect(said).toContain("Saved credential file deleted.");
    expect(asked).toEqual(["Enter choice [1]: ", "Enter choice [1]: ", "CLIST username: ", "CLIST API key: "]);
    await expect(store.load()).resolves.toEqual({ username: "bob", apiKey: "other-test-key" });
  });

  it("prompts for fresh input after the saved file is deleted", async () => {
    await store.save({ username: "alice", apiKey: "test-key" });
    await store.delete();
    const { prompter, asked } = scriptedPrompter(["carol", "third-test-key"]);

    await expect(selectCredentials(prompter, store)).resolves.toEqual({
      username: "carol",
      apiKey: "third-test-key",
    });
    expect(asked).toEqual(["CLIST username: ", "CLIST API key: "]);
  });
});

describe("promptTimestamp", () => {
  it("re-asks until the value parses", async () => {
    const { prompter, said, asked } = scriptedPrompter(["June 1st", "2025-06-01T08:00:00+08:00"]);

    await expect(promptTimestamp(prompter, "Start: ")).resolves.toEqual(new Date("2025-06-01T00:00:00Z"));
    expect(asked).toEqual(["Start: ", "Start: "]);
    expect(said).toEqual(["Invalid datetime. Use ISO format like 2025-01-01T00:00:00+00:00 or append 'Z'."]);
  });

  it("returns null for blank input", async () => {
    const { prompter } = scriptedPrompter(["  "]);
    await expect(promptTimestamp(prompter, "End: ")).resolves.toBeNull();
  });
});

describe("promptYesNo", () => {
  it.each([
    ["", false],
    ["y", true],
    ["YES", true],
    ["no", false],
  ])("reads %j", async (answer, expected) => {
    const { prompter } = scriptedPrompter([answer]);
    await expect(promptYesNo(prompter, "Include?", false)).resolves.toBe(expected);
  });

  it("re-asks on anything else", async () => {
    const { prompter, asked, said } = scriptedPrompter(["maybe", "y"]);
    await expect(promptYesNo(prompter, "Include?", false)).resolves.toBe(true);
    expect(asked).toEqual(["Include? [y/N]: ", "Include? [y/N]: "]);
    expect(said).toEqual(["Please answer yes or no."]);
  });
});

describe("collectHelperAnswers", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "contestcal-helper-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("gathers credentials, time range, ended flag and output path", async () => {
    const store = new CredentialStore(join(dir, "clist_credentials.json"));
    await store.save({ username: "alice", apiKey: "test-key" });
    const { prompter, remaining } = scriptedPrompter(["1", "2025-06-01T00:00:00Z", "", "y", ""]);

    await expect(collectHelperAnswers(prompter, store)).resolves.toEqual({
      credentials: { username: "alice", apiKey: "test-key" },
      startsAfter: new Date("2025-06-01T00:00:00Z"),
      endsBefore: null,
      includeEnded: true,
      outputPath: "contests.ics",
    });
    expect(remaining()).toBe(0);
  });
});
