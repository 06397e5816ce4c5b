/**
 * Tests for user settings loading and resolution.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  defaultSettingsPath,
  expandHome,
  getDefaultSettings,
  loadSettings,
  mergeWithCLIOptions,
  saveSettings,
} from './settings.js';

describe('settings paths', () => {
  it('uses XDG_CONFIG_HOME when set', () => {
    expect(defaultSettingsPath({ home: '/home/u', xdgConfigHome: '/xdg' })).toBe(
      path.join('/xdg', 'huectl', 'config.yaml')
    );
  });

  it('falls back to ~/.config', () => {
    expect(defaultSettingsPath({ home: '/home/u' })).toBe(
      path.join('/home/u', '.config', 'huectl', 'config.yaml')
    );
  });

  it('expands a leading tilde only', () => {
    expect(expandHome('~/themes', '/home/u')).toBe(path.join('/home/u', 'themes'));
    expect(expandHome('~', '/home/u')).toBe('/home/u');
    expect(expandHome('/opt/~/x', '/home/u')).toBe('/opt/~/x');
  });
});

describe('loadSettings', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'huectl-settings-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('returns defaults when the file does not exist', async () => {
    const settings = await loadSettings(path.join(tempDir, 'missing.yaml'));
    expect(settings).toEqual({ deployment_method: 'standard', app_paths: {}, nix: {} });
  });

  it('treats an empty file as defaults', async () => {
    const file = path.join(tempDir, 'config.yaml');
    await fs.writeFile(file, '');
    expect(await loadSettings(file)).toEqual(getDefaultSettings());
  });

  it('reads every field', async () => {
    const file = path.join(tempDir, 'config.yaml');
    await fs.writeFile(
      file,
      [
        'deployment_method: nix',
        'themes_dir: ~/my-themes',
        'app_paths:',
        '  kitty: ~/kitty/theme.conf',
        'nix:',
        '  output_path: /etc/nixos/themes',
        '',
      ].join('\n')
    );

    expect(await loadSettings(file)).toEqual({
      deployment_method: 'nix',
      themes_dir: '~/my-themes',
      app_paths: { kitty: '~/kitty/theme.conf' },
      nix: { output_path: '/etc/nixos/themes' },
    });
  });

  it('lists validation issues by path', async () => {
    const file = path.join(tempDir, 'config.yaml');
    await fs.writeFile(file, 'deployment_method: rsync\n');
    await expect(loadSettings(file)).rejects.toThrow(/Invalid settings in .*config\.yaml:\n {2}- deployment_method: /);
  });

  it('round-trips through saveSettings', async () => {
    const file = path.join(tempDir, 'nested', 'config.yaml');
    const settings = {
      ...getDefaultSettings(),
      deployment_method: 'nix' as const,
      app_paths: { waybar: '/tmp/waybar.css' },
    };
    await saveSettings(settings, file);

    const text = await fs.readFile(file, 'utf-8');
    expect(text).toBe('deployment_method: nix\napp_paths:\n  waybar: /tmp/waybar.css\n');
    expect(await loadSettings(file)).toEqual(settings);
  });
});

describe('mergeWithCLIOptions', () => {
  const env = { home: '/home/u' };

  it('resolves defaults under the config home', () => {
    const resolved = mergeWithCLIOptions(getDefaultSettings(), {}, env);
    expect(resolved).toEqual({
      deploymentMethod: 'standard',
      themesDir: path.resolve('/home/u/.config/huectl/themes'),
      configDir: path.resolve('/home/u/.config'),
      appPaths: {},
      nixOutputPath: path.resolve('/home/u/.config/home-manager/huectl'),
    });
  });

  it('prefers CLI options over settings', () => {
    const settings = { ...getDefaultSettings(), themes_dir: '~/from-settings' };
    const resolved = mergeWithCLIOptions(settings, { themesDir: '/cli/themes', configDir: '/cli/config' }, env);
    expect(resolved.themesDir).toBe(path.resolve('/cli/themes'));
    expect(resolved.configDir).toBe(path.resolve('/cli/config'));
    expect(resolved.nixOutputPath).toBe(path.resolve('/cli/config/home-manager/huectl'));
  });

  it('expands app path overrides and lower-cases their keys', () => {
    const settings = { ...getDefaultSettings(), app_paths: { Kitty: '~/k.conf' } };
    expect(mergeWithCLIOptions(settings, {}, env).appPaths).toEqual({
      kitty: path.resolve('/home/u/k.conf'),
    });
  });
});
