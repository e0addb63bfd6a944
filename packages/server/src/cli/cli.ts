#!/usr/bin/env -S node --import tsx
import process from "node:process";
import { ValidationError } from "@ecoscore/impact-core";
import { errorMessage } from "@ecoscore/shared";
import { printHelp } from "./command/help-command.js";
import { assessCommand } from "./command/assess-command.js";
import { methodologyCommand } from "./command/methodology-command.js";
import { serveCommand } from "./command/serve-command.js";

const VALID_COMMANDS = new Set(['serve', 'assess', 'methodology', 'help']);

async function main(argv: string[] = process.argv.slice(2)) {
    const [command = 'help', ...options] = argv;
    if (VALID_COMMANDS.has(command)) {
      switch (command) {
        case 'serve':
          await serveCommand(options);
          break;
        case 'assess':
          await assessCommand(options);
          break;
        case 'methodology':
          await methodologyCommand();
          break;
        default:
          printHelp();
          break;
      }
    } else {
      console.log(`[Message]: Invalid command "${command}"`);
      printHelp();
      process.exit(1);
    }
}

await main().catch((err: unknown) => {
  if (err instanceof ValidationError) {
    console.error("Invalid assessment request:");
    for (const issue of err.issues) console.error(`  - ${issue}`);
  } else {
    console.error(errorMessage(err));
  }
  printHelp();
  process.exit(1);
});
