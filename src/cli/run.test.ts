/**
 * Tests for the CLI, end to end in temporary directories.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import * as fs from "fs/promises";
import * as path from "path";
import * as os from "os";
import { stripVTControlCharacters } from "util";
import { runCLI } from "./run.js";
import { FULL_THEME_TOML, MINIMAL_THEME_TOML, createMinimalTheme } from "../testing/fixtures.js";
import { generate, renderHomeManagerModule } from "../generators/index.js";
import { BLOCK_START } from "../deploy/index.js";
import { loadTheme } from "../validator/index.js";
import { STARTER_THEME_FILE } from "./themes.js";

describe("runCLI", () => {
  let tempDir: string;
  let themesDir: string;
  let configDir: string;
  let settingsPath: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;
  let processExitSpy: MockInstance<typeof process.exit>;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "huectl-cli-test-"));
    themesDir = path.join(tempDir, "themes");
    configDir = path.join(tempDir, "config");
    settingsPath = path.join(tempDir, "settings.yaml");
    await fs.mkdir(themesDir);
    await fs.writeFile(path.join(themesDir, "test-theme.toml"), MINIMAL_THEME_TOML);
    await fs.writeFile(path.join(themesDir, "full-test-theme.toml"), FULL_THEME_TOML);

    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit called");
    });
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    processExitSpy.mockRestore();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function cli(...args: string[]): Promise<void> {
    return runCLI(["node", "huectl", "--settings", settingsPath, "--themes-dir", themesDir, ...args]);
  }

  function printed(spy: ReturnType<typeof vi.spyOn>): string[] {
    return spy.mock.calls.map((call) => stripVTControlCharacters(call.map(String).join(" ")));
  }

  const logged = () => printed(consoleLogSpy);
  const errors = () => printed(consoleErrorSpy);

  describe("apply", () => {
    it("deploys the requested targets", async () => {
      await cli("apply", "test-theme", "--config-dir", configDir, "--apps", "kitty,hyprland");

      const kitty = await fs.readFile(path.join(configDir, "kitty", "kitty.conf"), "utf-8");
      expect(kitty).toBe(generate(createMinimalTheme(), "kitty"));
      const hyprland = await fs.readFile(path.join(configDir, "hypr", "hyprland.conf"), "utf-8");
      expect(hyprland.startsWith(`${BLOCK_START}\n# Hyprland theme: test-theme\n`)).toBe(true);
      expect(logged()).toContain("Applied theme 'test-theme': 2 created, 0 updated, 0 unchanged");
      expect(processExitSpy).not.toHaveBeenCalled();
    });

    it("deploys every target by default", async () => {
      await cli("apply", "test-theme", "--config-dir", configDir);
      expect(logged()).toContain("Applied theme 'test-theme': 15 created, 0 updated, 0 unchanged");
      await expect(fs.access(path.join(configDir, "nvim", "colors", "test-theme.lua"))).resolves.toBeUndefined();
    });

    it("reports unchanged files on a second run", async () => {
      await cli("apply", "test-theme", "--config-dir", configDir, "--apps", "mako");
      await cli("apply", "test-theme", "--config-dir", configDir, "--apps", "mako");
      expect(logged()).toContain("Applied theme 'test-theme': 0 created, 0 updated, 1 unchanged");
    });

    it("writes nothing in a dry run", async () => {
      await cli("apply", "test-theme", "--config-dir", configDir, "--apps", "kitty", "--dry-run");

      await expect(fs.access(configDir)).rejects.toThrow();
      expect(logged()).toContain(
        `✓ kitty      would be created: ${path.join(configDir, "kitty", "kitty.conf")}`
      );
      expect(logged()).toContain("Dry run for theme 'test-theme': 1 created, 0 updated, 0 unchanged");
    });

    it("derives a variant before deploying", async () => {
      await cli("apply", "test-theme", "--config-dir", configDir, "--apps", "kitty", "--variant", "light");
      const kitty = await fs.readFile(path.join(configDir, "kitty", "kitty.conf"), "utf-8");
      expect(kitty.split("\n")[0]).toBe("# Kitty theme: test-theme-light");
    });

    it("writes Home Manager modules under the nix method", async () => {
      await fs.writeFile(settingsPath, "deployment_method: nix\n");
      await cli("apply", "test-theme", "--config-dir", configDir, "--apps", "kitty");

      const module = await fs.readFile(path.join(configDir, "home-manager", "huectl", "kitty.nix"), "utf-8");
      expect(module).toBe(renderHomeManagerModule(createMinimalTheme(), "kitty"));
    });

    it("fails before writing anything for an unknown target", async () => {
      await expect(
        cli("apply", "test-theme", "--config-dir", configDir, "--apps", "kitty,alacritty")
      ).rejects.toThrow("process.exit called");

      expect(processExitSpy).toHaveBeenCalledWith(1);
      expect(errors()[0]).toMatch(/^✗ Unknown format: 'alacritty'\. Supported formats: kitty, /);
      await expect(fs.access(configDir)).rejects.toThrow();
    });

    it("exits 1 when one target fails but still deploys the others", async () => {
      const blocker = path.join(tempDir, "blocker");
      await fs.writeFile(blocker, "");
      await fs.writeFile(settingsPath, `app_paths:\n  kitty: ${path.join(blocker, "kitty.conf")}\n`);

      await expect(
        cli("apply", "test-theme", "--config-dir", configDir, "--apps", "kitty,wofi")
      ).rejects.toThrow("process.exit called");

      expect(errors()).toHaveLength(1);
      expect(errors()[0]).toContain(`✗ Failed to deploy kitty to ${path.join(blocker, "kitty.conf")}`);
      expect(await fs.readFile(path.join(configDir, "wofi", "style.css"), "utf-8")).toBe(
        generate(createMinimalTheme(), "wofi")
      );
    });

    it("reports a missing theme", async () => {
      await expect(cli("apply", "nope", "--config-dir", configDir)).rejects.toThrow("process.exit called");
      expect(errors()).toEqual([`✗ Theme 'nope' not found in ${themesDir}`]);
    });
  });

  describe("list, show and validate", () => {
    it("lists themes and flags broken files", async () => {
      await fs.writeFile(path.join(themesDir, "broken.toml"), "name = ");
      await cli("list");

      const lines = logged();
      expect(lines[0]).toBe(`Themes in ${themesDir}:`);
      expect(lines[1]).toMatch(/^✗ broken\.toml/);
      expect(lines[2]).toBe(`• ${"full-test-theme".padEnd(24)} Full test theme with all colors`);
      expect(lines[3]).toBe(`• ${"test-theme".padEnd(24)} Test theme`);
    });

    it("suggests init when the themes directory is missing", async () => {
      await fs.rm(themesDir, { recursive: true });
      await cli("list");
      expect(logged()).toEqual([`No themes directory at ${themesDir}. Run 'huectl init' to create one.`]);
    });

    it("shows colors and properties", async () => {
      await cli("show", "full-test-theme");
      const lines = logged().join("\n").split("\n");

      expect(lines[0]).toBe("full-test-theme");
      expect(lines).toContain("Variant: dark");
      expect(lines.some((line) => line.endsWith("accent   #fe8019"))).toBe(true);
      expect(lines).toContain(`  ${"border_radius".padEnd(18)} 8px`);
      expect(lines).toContain(`  ${"animation_duration".padEnd(18)} 0.2s`);
    });

    it("previews one format after the theme details", async () => {
      await cli("preview", "test-theme", "--format", "Mako");

      const lines = logged();
      expect(lines[0].split("\n")[0]).toBe("test-theme");
      expect(lines).toContain("── mako");
      expect(lines[lines.length - 1]).toBe(generate(createMinimalTheme(), "mako").trimEnd());
      expect(lines.filter((line) => line.startsWith("── "))).toEqual(["── mako"]);
    });

    it("previews every format by default", async () => {
      await cli("preview", "test-theme");
      const headers = logged().filter((line) => line.startsWith("── "));
      expect(headers).toHaveLength(16);
      expect(headers[0]).toBe("── kitty");
    });

    it("exits 1 when previewing an unknown format", async () => {
      await expect(cli("preview", "test-theme", "--format", "emacs")).rejects.toThrow("process.exit called");
      expect(errors()[0]).toMatch(/^✗ Unknown format: 'emacs'/);
    });

    it("validates a good theme file", async () => {
      const file = path.join(themesDir, "test-theme.toml");
      await cli("validate", file);
      expect(logged()).toEqual([`✓ ${file}: theme 'test-theme' is valid`, "No accessibility issues found"]);
    });

    it("prints accessibility warnings without failing", async () => {
      const file = path.join(themesDir, "full-test-theme.toml");
      await cli("validate", file);
      expect(logged()).toContain("⚠ Colors 'magenta' and 'purple' are very similar (distance: 0.0)");
      expect(processExitSpy).not.toHaveBeenCalled();
    });

    it("exits 1 for an invalid theme file", async () => {
      const file = path.join(tempDir, "bad.toml");
      await fs.writeFile(file, MINIMAL_THEME_TOML.replace('red = "#cc241d"\n', ""));

      await expect(cli("validate", file)).rejects.toThrow("process.exit called");
      expect(logged().join("\n")).toContain("Theme validation failed:");
    });
  });

  describe("export", () => {
    it("writes one format to stdout", async () => {
      const writeSpy = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
      try {
        await cli("export", "test-theme", "KITTY");
        expect(writeSpy).toHaveBeenCalledWith(generate(createMinimalTheme(), "kitty"));
      } finally {
        writeSpy.mockRestore();
      }
    });

    it("writes one format to a file", async () => {
      const out = path.join(tempDir, "out", "theme.lua");
      await cli("export", "test-theme", "neovim", "--output", out);
      expect(await fs.readFile(out, "utf-8")).toBe(generate(createMinimalTheme(), "neovim"));
    });

    it("writes every format to a directory", async () => {
      const out = path.join(tempDir, "all");
      await cli("export", "test-theme", "all", "--output", out);

      const files = await fs.readdir(out);
      expect(files).toHaveLength(16);
      expect(files).toContain("gtk-css.css");
      expect(await fs.readFile(path.join(out, "nix.nix"), "utf-8")).toBe(generate(createMinimalTheme(), "nix"));
    });

    it("exits 1 for an unknown format", async () => {
      await expect(cli("export", "test-theme", "emacs")).rejects.toThrow("process.exit called");
      expect(errors()[0]).toMatch(/^✗ Unknown format: 'emacs'/);
    });
  });

  describe("init and variant", () => {
    it("creates settings and a starter theme once", async () => {
      const freshThemes = path.join(tempDir, "fresh");
      await runCLI(["node", "huectl", "--settings", settingsPath, "--themes-dir", freshThemes, "init"]);

      expect(await fs.readFile(settingsPath, "utf-8")).toBe("deployment_method: standard\n");
      const starter = await fs.readFile(path.join(freshThemes, STARTER_THEME_FILE), "utf-8");
      expect(loadTheme(starter).name).toBe("starter-dark");

      consoleLogSpy.mockClear();
      await runCLI(["node", "huectl", "--settings", settingsPath, "--themes-dir", freshThemes, "init"]);
      expect(logged()).toEqual([`Themes directory ${freshThemes} already has 1 theme(s)`]);
    });

    it("saves a derived variant next to its source", async () => {
      await cli("variant", "create", "test-theme", "light");

      const text = await fs.readFile(path.join(themesDir, "test-theme-light.toml"), "utf-8");
      const theme = loadTheme(text);
      expect(theme.variant).toBe("light");
      expect(theme.colors.bg.toHex()).toBe("#c9c9c9");

      await expect(cli("variant", "create", "test-theme", "light")).rejects.toThrow("process.exit called");
      await cli("variant", "create", "test-theme", "light", "--force");
    });
  });

  describe("backups", () => {
    it("lists, restores and cleans backups", async () => {
      const kittyFile = path.join(configDir, "kitty", "kitty.conf");
      await fs.mkdir(path.dirname(kittyFile), { recursive: true });
      await fs.writeFile(kittyFile, "current\n");
      await fs.writeFile(`${kittyFile}.1000.bak`, "ancient\n");

      await cli("backups", "list", "--config-dir", configDir);
      expect(logged()).toEqual([`1970-01-01T00:16:40.000Z  ${kittyFile}.1000.bak`]);

      await cli("backups", "restore", `${kittyFile}.1000.bak`, "--yes");
      expect(await fs.readFile(kittyFile, "utf-8")).toBe("ancient\n");

      await cli("backups", "clean", "--days", "1", "--config-dir", configDir, "--yes");
      const remaining = (await fs.readdir(path.dirname(kittyFile))).filter((name) => name.endsWith(".1000.bak"));
      expect(remaining).toEqual([]);
    });

    it("says so when there are no backups", async () => {
      await cli("backups", "list", "--config-dir", configDir);
      expect(logged()).toEqual(["No backups found"]);
    });
  });

  describe("config", () => {
    it("updates and shows settings", async () => {
      await cli("config", "set-deployment", "nix");
      await cli("config", "set-path", "Kitty", "/tmp/kitty.conf");
      await cli("config", "set-nix-path", "/etc/nixos/themes");

      expect(await fs.readFile(settingsPath, "utf-8")).toBe(
        [
          "deployment_method: nix",
          "app_paths:",
          "  kitty: /tmp/kitty.conf",
          "nix:",
          "  output_path: /etc/nixos/themes",
          "",
        ].join("\n")
      );

      consoleLogSpy.mockClear();
      await cli("config", "show");
      expect(logged()).toContain("deployment_method:  nix");
      expect(logged()).toContain(`  kitty: ${path.resolve("/tmp/kitty.conf")}`);
    });

    it("rejects unknown methods and non-deployable targets", async () => {
      await expect(cli("config", "set-deployment", "rsync")).rejects.toThrow("process.exit called");
      await expect(cli("config", "set-path", "nix", "/tmp/x")).rejects.toThrow("process.exit called");
      await expect(fs.access(settingsPath)).rejects.toThrow();
    });
  });
});
