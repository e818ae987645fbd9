import { parseArgs } from "node:util";
import { extractInlineOptions, INLINE_CONFIG_OPTIONS } from "../../config";
import { createBackupCycle, Scheduler } from "../../core";
import { redactUrl } from "../../transport";
import { setLogLevel } from "../../utils/logger";
import { color, formatSummary, ui } from "../ui";
import { loadCommandConfig, prepareFolders } from "./shared";

export async function startCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
      // Inline config options
      ...INLINE_CONFIG_OPTIONS,
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  const config = await loadCommandConfig(values.config, extractInlineOptions(values));
  if (!config) {
    return 1;
  }

  try {
    ui.intro("hookvault scheduler");

    await prepareFolders(config);

    ui.note(
      formatSummary([
        { label: "Folder", value: config.folderToBackup },
        { label: "Artifact", value: `${config.backupFolder}/${config.archive.name}` },
        { label: "Cadence", value: `every ${config.cadenceMinutes} minutes` },
        { label: "Format", value: config.archive.format },
      ]),
      "Configuration",
    );

    ui.step("Configured webhooks:");
    for (const webhook of config.webhooks) {
      ui.message(`  ${color.cyan(redactUrl(webhook))}`);
    }

    const scheduler = new Scheduler(createBackupCycle(config), config.cadenceMinutes);

    // Handle shutdown signals
    const shutdown = () => {
      ui.cancel("Shutting down...");
      scheduler.stop();
    };

    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);

    ui.success("Scheduler is running");
    ui.info("Press Ctrl+C to stop");

    try {
      await scheduler.run();
    } finally {
      process.off("SIGINT", shutdown);
      process.off("SIGTERM", shutdown);
    }

    return 0;
  } catch (error) {
    ui.error(`Failed to start: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("hookvault start")} - Start the backup scheduler

${color.dim("USAGE:")}
  hookvault start [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./hookvault.config.yaml)
      --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
      --folder <path>          Folder to back up
      --backup-folder <path>   Folder the archive is written to (default: ./backups)
      --webhook <url>          Webhook URL (can be repeated)
      --cooldown <expr>        Cadence as "*/<minutes> * * * *" (default: */60 * * * *)
      --format <7z|tar.gz>     Archive format (default: 7z)
      --mention <tag>          Tag included in link messages for large archives

${color.dim("DESCRIPTION:")}
  Archives the folder, relays the archive to one randomly chosen webhook,
  waits the cooldown, and repeats until stopped. Archives under 23 MiB are
  attached directly; larger ones are uploaded to file.io and only the link
  is sent.

${color.dim("EXAMPLES:")}
  hookvault start                                   # Start with default config
  hookvault start -c /etc/hookvault.yaml            # Start with specific config
  hookvault start --folder ./data --webhook https://example.com/hook
`);
}
