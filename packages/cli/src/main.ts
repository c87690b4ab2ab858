#!/usr/bin/env -S node --import tsx

/**
 * appshell CLI entry point.
 *
 * Parses arguments and hands off to the command implementations in
 * commands.ts. Every command resolves to an exit code.
 */

import { getHelp, isError, parseArgs } from "./args.js";
import { runConsole, runRecent, runRedact, runSettings } from "./commands.js";

const VERSION = "0.1.0";

async function main(): Promise<number> {
  const result = parseArgs(process.argv);

  if (isError(result)) {
    console.error(result.error);
    return 1;
  }

  switch (result.command) {
    case "help":
      console.log(getHelp(result.topic));
      return 0;
    case "version":
      console.log(VERSION);
      return 0;
    case "redact":
      return runRedact(result);
    case "console":
      // Ctrl+C reaches the child through the shared process group
      process.on("SIGINT", () => {});
      return runConsole(result);
    case "settings":
      return runSettings(result);
    case "recent":
      return runRecent(result);
  }
}

main()
  .then((code) => {
    // Let pending stdout writes drain instead of exiting mid-pipe
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("Fatal:", err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
