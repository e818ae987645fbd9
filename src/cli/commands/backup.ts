import { parseArgs } from "node:util";
import { CYCLE_CONFIG_OPTIONS, extractInlineOptions } from "../../config";
import { createBackupCycle } from "../../core";
import { setLogLevel } from "../../utils/logger";
import { formatBytes, formatDuration } from "../../utils/format";
import { color, formatOutcome, formatSummary, ui } from "../ui";
import { loadCommandConfig, prepareFolders } from "./shared";

export async function backupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
      // Inline config options
      ...CYCLE_CONFIG_OPTIONS,
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
    ui.intro("hookvault backup");

    await prepareFolders(config);

    const s = ui.spinner();
    s.start("Archiving and relaying...");

    const report = await createBackupCycle(config).execute();

    s.stop(report.outcome === "success" ? "Backup relayed" : "Backup did not complete");

    ui.note(
      formatSummary([
        { label: "Cycle ID", value: report.cycleId },
        { label: "Outcome", value: formatOutcome(report.outcome) },
        { label: "Archive", value: report.artifact?.path },
        { label: "Size", value: report.artifact ? formatBytes(report.artifact.sizeBytes) : null },
        { label: "SHA-256", value: report.checksum },
        { label: "Transfer", value: report.transferMode },
        { label: "Duration", value: formatDuration(report.durationMs) },
      ]),
      "Backup Summary",
    );

    if (report.outcome !== "success") {
      ui.error("Backup failed");
      return 1;
    }

    ui.outro("Backup complete!");
    return 0;
  } catch (error) {
    ui.error(`Backup failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("hookvault backup")} - Run one backup cycle now

${color.dim("USAGE:")}
  hookvault backup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./hookvault.config.yaml)
      --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
      --folder <path>          Folder to back up
      --backup-folder <path>   Folder the archive is written to (default: ./backups)
      --webhook <url>          Webhook URL (can be repeated)
      --format <7z|tar.gz>     Archive format (default: 7z)
      --mention <tag>          Tag included in link messages for large archives

${color.dim("EXAMPLES:")}
  hookvault backup                                   # One cycle with default config
  hookvault backup --folder ./data --webhook https://example.com/hook --format tar.gz
`);
}
