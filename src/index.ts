#!/usr/bin/env -S npx tsx

import * as p from "@clack/prompts";
import { backupCommand } from "./cli/commands/backup";
import { startCommand } from "./cli/commands/start";
import { color, printLogo, VERSION } from "./cli/ui";

interface Command {
  summary: string;
  run(args: string[]): Promise<number>;
}

const COMMANDS: Record<string, Command> = {
  start: { summary: "Archive and relay on the configured cadence", run: startCommand },
  backup: { summary: "Run one backup cycle now", run: backupCommand },
};

function printHelp(): void {
  printLogo();
  p.intro(`${color.cyan("hookvault")} ${color.dim(`v${VERSION}`)} - folder backups relayed to webhooks`);

  const width = Math.max(...Object.keys(COMMANDS).map((name) => name.length)) + 4;
  p.note(
    Object.entries(COMMANDS)
      .map(([name, command]) => `${color.cyan(name.padEnd(width))}${command.summary}`)
      .join("\n"),
    "Commands",
  );

  p.note(`-h, --help      Show this help message\n-v, --version   Show version`, "Options");

  p.note(
    [
      `hookvault start -c hookvault.config.yaml   ${color.dim("# Run with a config file")}`,
      `hookvault backup --folder ./data --webhook https://chat.example.com/hook`,
    ].join("\n"),
    "Examples",
  );

  p.outro(`Run ${color.cyan("hookvault <command> --help")} for command details`);
}

async function main(argv: string[]): Promise<number> {
  const [name, ...rest] = argv;

  if (name === undefined || name === "-h" || name === "--help" || name === "help") {
    printHelp();
    return 0;
  }

  if (name === "-v" || name === "--version" || name === "version") {
    console.log(VERSION);
    return 0;
  }

  const command = COMMANDS[name];
  if (!command) {
    console.error(`${color.red("Error:")} Unknown command: ${name}`);
    console.error(`Run ${color.cyan("hookvault --help")} for usage information.`);
    return 1;
  }

  return command.run(rest);
}

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
