import { DEFAULT_CALENDAR_NAME, DEFAULT_PRODUCT_ID } from "@contestcal/calendar";
import { DEFAULT_RESOURCES } from "@contestcal/connectors";
import { type Credentials, loadRuntimeEnv, parseIsoTimestamp, TimeParsingError } from "@contestcal/shared";

import { DEFAULT_OUTPUT_PATH, DEFAULT_PER_RESOURCE_LIMIT } from "../args";
import { CredentialStore } from "../credentials/store";
import { createTerminalPrompter, type Prompter } from "../ui/prompt";
import { type CommandContext, currentTime } from "./context";
import { buildWindow, reportExport, runContestExport } from "./export";

export interface HelperAnswers {
  credentials: Credentials;
  startsAfter: Date | null;
  endsBefore: Date | null;
  includeEnded: boolean;
  outputPath: string;
}

async function promptNonEmpty(prompter: Prompter, question: string, secret = false): Promise<string> {
  while (true) {
    const value = (secret ? await prompter.askSecret(question) : await prompter.ask(question)).trim();
    if (value) return value;
    prompter.say("Value cannot be empty. Please try again.");
  }
}

async function promptMenuChoice(prompter: Prompter, fallback: string, options: readonly string[]): Promise<string> {
  while (true) {
    const answer = (await prompter.ask(`Enter choice [${fallback}]: `)).trim();
    if (!answer) return fallback;
    if (options.includes(answer)) return answer;
    prompter.say("Invalid choice, please try again.");
  }
}

export async function promptYesNo(prompter: Prompter, question: string, fallback: boolean): Promise<boolean> {
  const suffix = fallback ? " [Y/n]" : " [y/N]";
  while (true) {
    const answer = (await prompter.ask(`${question}${suffix}: `)).trim().toLowerCase();
    if (!answer) return fallback;
    if (answer === "y" || answer === "yes") return true;
    if (answer === "n" || answer === "no") return false;
    prompter.say("Please answer yes or no.");
  }
}

/** Blank input yields null; anything else is re-asked until it parses. */
export async function promptTimestamp(prompter: Prompter, question: string): Promise<Date | null> {
  while (true) {
    const answer = (await prompter.ask(question)).trim();
    if (!answer) return null;
    try {
      return parseIsoTimestamp(answer);
    } catch (err) {
      if (!(err instanceof TimeParsingError)) throw err;
      prompter.say("Invalid datetime. Use ISO format like 2025-01-01T00:00:00+00:00 or append 'Z'.");
    }
  }
}

async function promptNewCredentials(prompter: Prompter): Promise<Credentials> {
  const username = await promptNonEmpty(prompter, "CLIST username: ");
  prompter.say("(API key input is hidden; paste and press Enter.)");
  const apiKey = await promptNonEmpty(prompter, "CLIST API key: ", true);
  prompter.say();
  return { username, apiKey };
}

/**
 * Offer saved credentials when present. Choosing new ones deletes the saved
 * file first; fresh input is saved before returning.
 */
export async function selectCredentials(prompter: Prompter, store: CredentialStore): Promise<Credentials> {
  const saved = await store.load();

  if (saved) {
    prompter.say("Saved credentials detected:");
    prompter.say(`  Username: ${saved.username}`);
    prompter.say("Select an option:");
    prompter.say("  1) Use the saved credentials");
    prompter.say("  2) Enter new credentials and delete saved data");
    const choice = await promptMenuChoice(prompter, "1", ["1", "2"]);
    if (choice === "1") return saved;
    if (await store.delete()) prompter.say("Saved credential file deleted.");
    prompter.say();
  } else {
    prompter.say("No saved credentials found. Please enter them now.");
    prompter.say();
  }

  const credentials = await promptNewCredentials(prompter);
  await store.save(credentials);
  prompter.say("Credentials saved.");
  prompter.say();
  return credentials;
}

export async function collectHelperAnswers(prompter: Prompter, store: CredentialStore): Promise<HelperAnswers> {
  prompter.say("CLIST contest calendar helper");
  prompter.say("--------------------------------");
  prompter.say();

  const credentials = await selectCredentials(prompter, store);
  const startsAfter = await promptTimestamp(prompter, "Enter start time (ISO, blank for default now): ");
  const endsBefore = await promptTimestamp(prompter, "Enter end time (ISO, blank to skip): ");
  const includeEnded = await promptYesNo(prompter, "Include contests that already ended?", false);
  const outputPath = (await prompter.ask(`Output .ics path [${DEFAULT_OUTPUT_PATH}]: `)).trim() || DEFAULT_OUTPUT_PATH;

  return { credentials, startsAfter, endsBefore, includeEnded, outputPath };
}

export async function helperCommand(argv: readonly string[], ctx: CommandContext): Promise<number> {
  if (argv.includes("--help") || argv.includes("-h")) {
    console.log("Usage:");
    console.log("  helper");
    console.log("");
    console.log("Asks for credentials (saved between runs), a time range and an output path, then exports.");
    return 0;
  }

  const store = new CredentialStore(loadRuntimeEnv(ctx.env).credentialsPath);
  const prompter = ctx.prompter ?? createTerminalPrompter();
  let answers: HelperAnswers;
  try {
    answers = await collectHelperAnswers(prompter, store);
  } finally {
    prompter.close();
  }

  const now = currentTime(ctx);
  console.log(`Exporting contests for ${answers.credentials.username} to ${answers.outputPath}...`);
  const result = await runContestExport(
    {
      credentials: answers.credentials,
      resources: DEFAULT_RESOURCES,
      window: buildWindow({
        startsAfter: answers.startsAfter,
        endsBefore: answers.endsBefore,
        includeEnded: answers.includeEnded,
        now,
      }),
      includeEnded: answers.includeEnded,
      perResourceLimit: DEFAULT_PER_RESOURCE_LIMIT,
      maxContests: 0,
      calendarName: DEFAULT_CALENDAR_NAME,
      productId: DEFAULT_PRODUCT_ID,
      outputPath: answers.outputPath,
    },
    ctx,
    now,
  );
  return reportExport(result);
}
