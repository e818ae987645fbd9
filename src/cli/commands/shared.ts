import { ConfigError, findAndLoadConfig, type InlineConfigOptions } from "../../config";
import type { HookvaultConfig } from "../../types";
import { ensureDir, isDirectory } from "../../utils/path";
import { ui } from "../ui";

/**
 * Load configuration for a command, reporting failures through the UI.
 * Returns null when the command should exit with code 1.
 */
export async function loadCommandConfig(
  configPath: string | undefined,
  inline: InlineConfigOptions,
): Promise<HookvaultConfig | null> {
  try {
    return await findAndLoadConfig(configPath, inline);
  } catch (error) {
    if (error instanceof ConfigError) {
      ui.error(`Error loading config: ${error.message}`);
      ui.info("Failed to load configuration.");
      return null;
    }
    throw error;
  }
}

/**
 * Create the backup folder and check the source exists
 */
export async function prepareFolders(config: HookvaultConfig): Promise<void> {
  await ensureDir(config.backupFolder);

  if (!(await isDirectory(config.folderToBackup))) {
    ui.warn(`Folder to back up does not exist yet: ${config.folderToBackup}`);
  }
}
