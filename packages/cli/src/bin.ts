#!/usr/bin/env -S node --import tsx

import { loadCliConfig } from "./config.js";
import { runStart } from "./start.js";

function printHelp(): void {
  process.stdout.write(
    [
      "parley commands:",
      "  parley start    start the gateway with parley.config.* from the current directory",
      "  parley help     show this message"
    ].join("\n") + "\n"
  );
}

async function main(): Promise<number> {
  const [command, ...args] = process.argv.slice(2);

  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return 0;
  }

  if (command === "start") {
    if (args.length > 0) {
      process.stderr.write(`Unknown start option: ${args[0] ?? ""}\n`);
      return 1;
    }
    const loadedConfig = await loadCliConfig();
    return await runStart(loadedConfig);
  }

  process.stderr.write(`Unknown command: ${command}\n`);
  printHelp();
  return 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
