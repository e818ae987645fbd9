import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  buildConfig,
  ConfigError,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
} from "../../src/config/loader";

const WEBHOOK_A = "https://hooks.example/api/webhooks/1/test-secret";
const WEBHOOK_B = "https://hooks.example/api/webhooks/2/test-secret";

describe("config loader", () => {
  let workDir: string;

  async function writeConfig(name: string, content: string): Promise<string> {
    const configPath = path.join(workDir, name);
    await writeFile(configPath, content);
    return configPath;
  }

  beforeEach(async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    workDir = await mkdtemp(path.join(tmpdir(), "hookvault-config-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(workDir, { recursive: true, force: true });
  });

  describe("loadConfig", () => {
    test("loads a YAML file and applies defaults", async () => {
      const configPath = await writeConfig(
        "hookvault.config.yaml",
        `folderToBackup: ./data\nwebhooks:\n  - ${WEBHOOK_A}\n  - ${WEBHOOK_B}\n`,
      );

      const config = await loadConfig(configPath);

      expect(config).toEqual({
        folderToBackup: path.join(workDir, "data"),
        backupFolder: path.join(workDir, "backups"),
        webhooks: [WEBHOOK_A, WEBHOOK_B],
        cooldownDuration: "*/60 * * * *",
        cadenceMinutes: 60,
        archive: { format: "7z", name: "backup.7z" },
        timeouts: { archiveMs: 3_600_000, requestMs: 600_000 },
      });
    });

    test("loads a JSON file with every field set", async () => {
      const configPath = await writeConfig(
        "config.json",
        JSON.stringify({
          folderToBackup: "/srv/data",
          backupFolder: "/srv/backups",
          webhooks: [WEBHOOK_A],
          cooldownDuration: "*/15 * * * *",
          archive: { format: "tar.gz", name: "nightly.tar.gz" },
          mention: "<@&1234>",
          timeouts: { archiveMs: 1000, requestMs: 2000 },
        }),
      );

      const config = await loadConfig(configPath);

      expect(config).toEqual({
        folderToBackup: "/srv/data",
        backupFolder: "/srv/backups",
        webhooks: [WEBHOOK_A],
        cooldownDuration: "*/15 * * * *",
        cadenceMinutes: 15,
        archive: { format: "tar.gz", name: "nightly.tar.gz" },
        mention: "<@&1234>",
        timeouts: { archiveMs: 1000, requestMs: 2000 },
      });
    });

    test("names the artifact after its format", async () => {
      const configPath = await writeConfig(
        "hookvault.config.yml",
        `folderToBackup: /srv/data\nwebhooks: [${WEBHOOK_A}]\narchive:\n  format: tar.gz\n`,
      );

      const config = await loadConfig(configPath);

      expect(config.archive).toEqual({ format: "tar.gz", name: "backup.tar.gz" });
    });

    test("merges one timeout with the default of the other", async () => {
      const configPath = await writeConfig(
        "config.json",
        JSON.stringify({ folderToBackup: "/d", webhooks: [WEBHOOK_A], timeouts: { requestMs: 5000 } }),
      );

      expect((await loadConfig(configPath)).timeouts).toEqual({
        archiveMs: 3_600_000,
        requestMs: 5000,
      });
    });

    test("inline options override the file", async () => {
      const configPath = await writeConfig(
        "config.json",
        JSON.stringify({ folderToBackup: "/srv/data", webhooks: [WEBHOOK_A] }),
      );

      const config = await loadConfig(configPath, {
        webhook: [WEBHOOK_B],
        cooldown: "*/5 * * * *",
        mention: "@ops",
      });

      expect(config.webhooks).toEqual([WEBHOOK_B]);
      expect(config.cadenceMinutes).toBe(5);
      expect(config.mention).toBe("@ops");
      expect(config.folderToBackup).toBe("/srv/data");
    });

    test("non-step cooldown falls back to an hour", async () => {
      const configPath = await writeConfig(
        "config.json",
        JSON.stringify({ folderToBackup: "/d", webhooks: [WEBHOOK_A], cooldownDuration: "0 * * * *" }),
      );

      expect((await loadConfig(configPath)).cadenceMinutes).toBe(60);
    });

    test("rejects a missing file", async () => {
      const configPath = path.join(workDir, "absent.yaml");

      await expect(loadConfig(configPath)).rejects.toThrow(`Config file not found: ${configPath}`);
    });

    test("rejects an unsupported extension", async () => {
      const configPath = await writeConfig("config.toml", "folderToBackup = '/d'");

      await expect(loadConfig(configPath)).rejects.toThrow(
        "Unsupported config file format: .toml. Use .yaml, .yml, or .json",
      );
    });

    test("rejects invalid JSON", async () => {
      const configPath = await writeConfig("config.json", "{ not json");

      await expect(loadConfig(configPath)).rejects.toThrow(/^Failed to parse JSON/);
    });

    test("rejects a document that is not an object", async () => {
      const configPath = await writeConfig("hookvault.config.yaml", "- just\n- a list\n");

      await expect(loadConfig(configPath)).rejects.toThrow(
        `Config file must contain an object: ${configPath}`,
      );
    });

    test("rejects a malformed step cooldown", async () => {
      const configPath = await writeConfig(
        "config.json",
        JSON.stringify({ folderToBackup: "/d", webhooks: [WEBHOOK_A], cooldownDuration: "*/0 * * * *" }),
      );

      await expect(loadConfig(configPath)).rejects.toBeInstanceOf(ConfigError);
    });
  });

  describe("validation", () => {
    test.each([
      [{ webhooks: [WEBHOOK_A] }, "Config must have a 'folderToBackup' path"],
      [{ folderToBackup: "/d" }, "Config must have a 'webhooks' array"],
      [{ folderToBackup: "/d", webhooks: WEBHOOK_A }, "Config must have a 'webhooks' array"],
      [{ folderToBackup: "/d", webhooks: [] }, "Config must have at least one webhook"],
      [{ folderToBackup: "/d", webhooks: [WEBHOOK_A, "ftp://files.example"] }, "webhooks[1] must be an http(s) URL"],
      [{ folderToBackup: "/d", webhooks: [42] }, "webhooks[0] must be an http(s) URL"],
      [{ folderToBackup: "/d", webhooks: [WEBHOOK_A], backupFolder: "" }, "backupFolder must be a non-empty string"],
      [{ folderToBackup: "/d", webhooks: [WEBHOOK_A], cooldownDuration: 15 }, 'cooldownDuration must be a string such as "*/60 * * * *"'],
      [{ folderToBackup: "/d", webhooks: [WEBHOOK_A], archive: { format: "zip" } }, "archive.format must be one of: 7z, tar.gz"],
      [{ folderToBackup: "/d", webhooks: [WEBHOOK_A], archive: { name: "../escape.7z" } }, "archive.name must be a file name, not a path"],
      [{ folderToBackup: "/d", webhooks: [WEBHOOK_A], timeouts: { archiveMs: 0 } }, "timeouts.archiveMs must be a positive integer"],
      [{ folderToBackup: "/d", webhooks: [WEBHOOK_A], timeouts: { requestMs: "fast" } }, "timeouts.requestMs must be a positive integer"],
      [{ folderToBackup: "/d", webhooks: [WEBHOOK_A], timeouts: { archiveMs: 2_147_483_648 } }, "timeouts.archiveMs must be at most 2147483647"],
      [{ folderToBackup: "/d", webhooks: [WEBHOOK_A], timeouts: { requestMs: 3_000_000_000 } }, "timeouts.requestMs must be at most 2147483647"],
      [{ folderToBackup: "/d", webhooks: [WEBHOOK_A], mention: 5 }, "mention must be a string"],
    ])("rejects %j", (document, message) => {
      expect(() => buildConfig(document, "/base")).toThrow(new ConfigError(message));
    });

    test("accepts timeouts up to the timer limit", () => {
      const config = buildConfig(
        { folderToBackup: "/d", webhooks: [WEBHOOK_A], timeouts: { archiveMs: 2_147_483_647, requestMs: 1 } },
        "/base",
      );

      expect(config.timeouts).toEqual({ archiveMs: 2_147_483_647, requestMs: 1 });
    });

    test("resolves relative paths against the base directory", () => {
      const config = buildConfig({ folderToBackup: "data", webhooks: [WEBHOOK_A] }, "/base");

      expect(config.folderToBackup).toBe(path.resolve("/base", "data"));
      expect(config.backupFolder).toBe(path.resolve("/base", "backups"));
    });
  });

  describe("findConfigFile", () => {
    test("prefers YAML over JSON", async () => {
      await writeConfig("config.json", "{}");
      const yamlPath = await writeConfig("hookvault.config.yaml", "{}");

      expect(await findConfigFile(workDir)).toBe(yamlPath);
    });

    test("falls back to config.json", async () => {
      const jsonPath = await writeConfig("config.json", "{}");

      expect(await findConfigFile(workDir)).toBe(jsonPath);
    });
  });

  describe("findAndLoadConfig", () => {
    test("uses an explicit path", async () => {
      const configPath = await writeConfig(
        "custom.yaml",
        `folderToBackup: /srv/data\nwebhooks: [${WEBHOOK_A}]\n`,
      );

      expect((await findAndLoadConfig(configPath)).webhooks).toEqual([WEBHOOK_A]);
    });

    test("builds a config from inline options when no file exists", async () => {
      vi.spyOn(process, "cwd").mockReturnValue(workDir);

      const config = await findAndLoadConfig(undefined, {
        folder: "data",
        webhook: [WEBHOOK_A],
      });

      expect(config.folderToBackup).toBe(path.join(workDir, "data"));
      expect(config.backupFolder).toBe(path.join(workDir, "backups"));
      expect(config.webhooks).toEqual([WEBHOOK_A]);
    });

    test("lists what is missing without a file or inline options", async () => {
      vi.spyOn(process, "cwd").mockReturnValue(workDir);

      await expect(findAndLoadConfig(undefined, { folder: "/srv/data" })).rejects.toThrow(
        [
          "No config file found. Create hookvault.config.yaml or specify --config path.",
          "  - At least one --webhook is required when running without a config file",
        ].join("\n"),
      );
    });
  });
});
