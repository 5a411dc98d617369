#!/usr/bin/env tsx
import { loadDotEnvIfPresent } from "@contestcal/shared";

import { runCli } from "./cli";

async function main(): Promise<void> {
  loadDotEnvIfPresent();
  process.exitCode = await runCli(process.argv.slice(2), { env: process.env });
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
