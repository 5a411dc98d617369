import type { Prompter } from "../ui/prompt";

/** Process-level inputs a command reads; tests substitute each of them. */
export interface CommandContext {
  env: NodeJS.ProcessEnv;
  fetchImpl?: typeof fetch;
  now?: () => Date;
  prompter?: Prompter;
}

export function currentTime(ctx: CommandContext): Date {
  return ctx.now ? ctx.now() : new Date();
}
