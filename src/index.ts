#!/usr/bin/env node
import dotenv from "dotenv";
import { runCli } from "./cli";

async function main(): Promise<void> {
  dotenv.config({ override: false });
  const exitCode = await runCli(process.argv.slice(2));
  process.exitCode = exitCode;
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`fatal: ${message}`);
  process.exitCode = 1;
});
