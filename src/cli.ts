#!/usr/bin/env node

import ansis from "ansis";
import { Runner } from "./execution/runner";
import { printHelp } from "./help";

const INTERRUPTED_EXIT_CODE = 130;

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return;
  }

  const runner = new Runner();

  let interrupted = false;
  const interrupt = (): void => {
    if (interrupted) {
      return;
    }
    interrupted = true;
    runner.shutdown();
  };
  process.on("SIGINT", interrupt);
  process.on("SIGTERM", interrupt);

  const exitCode = await runner.run(args);
  process.exitCode = interrupted ? INTERRUPTED_EXIT_CODE : exitCode;
}

main().catch((error: unknown) => {
  console.error(ansis.red("Fatal error:"), error);
  process.exit(1);
});
