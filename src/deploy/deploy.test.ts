/**
 * Tests for deployment, block merging and target resolution.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { deploy, type DeploymentPlan } from './deploy.js';
import { BLOCK_END, BLOCK_START, mergeBlock } from './block.js';
import { managedDirectories, resolveTargets, selectTargets } from './targets.js';
import { DeploymentError, HuectlError, UnknownGeneratorError } from '../errors.js';
import { createMinimalTheme } from '../testing/fixtures.js';
import { generate, renderHomeManagerModule } from '../generators/index.js';
import type { ResolvedSettings } from '../config/index.js';

const NOW = new Date(1_700_000_000_000);
const now = () => NOW;

function plan(target: DeploymentPlan['target'], file: string, content: string): DeploymentPlan {
  return { target, path: file, content, strategy: target === 'hyprland' ? 'block' : 'replace' };
}

describe('deploy', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'huectl-deploy-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('creates missing parent directories', async () => {
    const file = path.join(tempDir, 'kitty', 'kitty.conf');
    const { records, failures } = await deploy([plan('kitty', file, 'background #000000\n')], { now });

    expect(failures).toEqual([]);
    expect(records).toEqual([
      { target: 'kitty', path: file, action: 'created', content: 'background #000000\n' },
    ]);
    expect(await fs.readFile(file, 'utf-8')).toBe('background #000000\n');
  });

  it('reports unchanged files without taking a backup', async () => {
    const file = path.join(tempDir, 'kitty.conf');
    await deploy([plan('kitty', file, 'same\n')], { now });
    const { records } = await deploy([plan('kitty', file, 'same\n')], { now });

    expect(records[0].action).toBe('unchanged');
    expect(records[0].backupPath).toBeUndefined();
    expect(await fs.readdir(tempDir)).toEqual(['kitty.conf']);
  });

  it('backs up the previous content before updating', async () => {
    const file = path.join(tempDir, 'kitty.conf');
    await fs.writeFile(file, 'old\n');

    const { records } = await deploy([plan('kitty', file, 'new\n')], { now });

    expect(records[0]).toEqual({
      target: 'kitty',
      path: file,
      action: 'updated',
      previous: 'old\n',
      content: 'new\n',
      backupPath: `${file}.1700000000.bak`,
    });
    expect(await fs.readFile(`${file}.1700000000.bak`, 'utf-8')).toBe('old\n');
    expect(await fs.readFile(file, 'utf-8')).toBe('new\n');
  });

  it('never overwrites an existing backup', async () => {
    const file = path.join(tempDir, 'kitty.conf');
    await fs.writeFile(file, 'old\n');
    await fs.writeFile(`${file}.1700000000.bak`, 'older\n');

    const { records } = await deploy([plan('kitty', file, 'new\n')], { now });

    expect(records[0].backupPath).toBe(`${file}.1700000000-1.bak`);
    expect(await fs.readFile(`${file}.1700000000.bak`, 'utf-8')).toBe('older\n');
    expect(await fs.readFile(`${file}.1700000000-1.bak`, 'utf-8')).toBe('old\n');
  });

  it('computes the same records in a dry run without touching the disk', async () => {
    const existing = path.join(tempDir, 'mako', 'config');
    const fresh = path.join(tempDir, 'waybar', 'style.css');
    await fs.mkdir(path.dirname(existing));
    await fs.writeFile(existing, 'old\n');
    const plans = [plan('mako', existing, 'new\n'), plan('waybar', fresh, '* {}\n')];

    const dry = await deploy(plans, { now, dryRun: true });

    expect(dry.failures).toEqual([]);
    expect(dry.records.map((r) => r.action)).toEqual(['updated', 'created']);
    expect(dry.records[0].backupPath).toBe(`${existing}.1700000000.bak`);
    expect(await fs.readFile(existing, 'utf-8')).toBe('old\n');
    expect(await fs.readdir(path.dirname(existing))).toEqual(['config']);
    await expect(fs.access(path.dirname(fresh))).rejects.toThrow();

    const real = await deploy(plans, { now });
    expect(real.records).toEqual(dry.records);
  });

  it('isolates a failing target', async () => {
    const blocker = path.join(tempDir, 'blocker');
    await fs.writeFile(blocker, 'not a directory');
    const good = path.join(tempDir, 'wofi', 'style.css');

    for (const dryRun of [true, false]) {
      const { records, failures } = await deploy(
        [plan('kitty', path.join(blocker, 'kitty.conf'), 'x\n'), plan('wofi', good, 'y\n')],
        { now, dryRun }
      );

      expect(failures).toHaveLength(1);
      expect(failures[0]).toBeInstanceOf(DeploymentError);
      expect(failures[0].target).toBe('kitty');
      expect(failures[0].path).toBe(path.join(blocker, 'kitty.conf'));
      expect(records.map((r) => r.target)).toEqual(['wofi']);
    }
    expect(await fs.readFile(good, 'utf-8')).toBe('y\n');
  });

  // root can write anywhere, so the permission check only shows for other users
  it.skipIf(process.getuid?.() === 0)('fails a dry run into a read-only directory', async () => {
    const readOnly = path.join(tempDir, 'locked');
    await fs.mkdir(readOnly, { mode: 0o555 });

    try {
      const { records, failures } = await deploy(
        [plan('kitty', path.join(readOnly, 'kitty', 'kitty.conf'), 'x\n')],
        { now, dryRun: true }
      );
      expect(records).toEqual([]);
      expect(failures.map((f) => f.target)).toEqual(['kitty']);
    } finally {
      await fs.chmod(readOnly, 0o755);
    }
  });

  it('merges block targets into the user file', async () => {
    const file = path.join(tempDir, 'hyprland.conf');
    await fs.writeFile(file, 'monitor=,preferred,auto,1\n');

    await deploy([plan('hyprland', file, 'first\n')], { now });
    expect(await fs.readFile(file, 'utf-8')).toBe(
      `monitor=,preferred,auto,1\n\n${BLOCK_START}\nfirst\n${BLOCK_END}\n`
    );

    const { records } = await deploy([plan('hyprland', file, 'second\n')], {
      now: () => new Date(1_700_000_100_000),
    });
    expect(records[0].action).toBe('updated');
    expect(await fs.readFile(file, 'utf-8')).toBe(
      `monitor=,preferred,auto,1\n\n${BLOCK_START}\nsecond\n${BLOCK_END}\n`
    );
  });
});

describe('mergeBlock', () => {
  it('creates a bare block for a missing or empty file', () => {
    expect(mergeBlock(undefined, 'a')).toBe(`${BLOCK_START}\na\n${BLOCK_END}\n`);
    expect(mergeBlock('  \n', 'a\n')).toBe(`${BLOCK_START}\na\n${BLOCK_END}\n`);
  });

  it('appends after content without a trailing newline', () => {
    expect(mergeBlock('x = 1', 'a\n')).toBe(`x = 1\n\n${BLOCK_START}\na\n${BLOCK_END}\n`);
  });

  it('keeps text around an existing block', () => {
    const existing = `before\n${BLOCK_START}\nold\n${BLOCK_END}\nafter\n`;
    expect(mergeBlock(existing, 'new\n')).toBe(`before\n${BLOCK_START}\nnew\n${BLOCK_END}\nafter\n`);
  });

  it('rejects an unterminated block', () => {
    expect(() => mergeBlock(`${BLOCK_START}\nold\n`, 'new')).toThrow(/without a matching/);
  });
});

describe('resolveTargets', () => {
  const theme = createMinimalTheme();
  const settings: ResolvedSettings = {
    deploymentMethod: 'standard',
    themesDir: '/themes',
    configDir: '/cfg',
    appPaths: { waybar: '/custom/waybar.css' },
    nixOutputPath: '/nix-out',
  };

  it('places standard targets under the config dir unless overridden', () => {
    const { plans, failures } = resolveTargets(theme, settings, { targets: ['kitty', 'waybar', 'hyprland'] });

    expect(failures).toEqual([]);
    expect(plans.map((p) => [p.target, p.path, p.strategy])).toEqual([
      ['kitty', path.join('/cfg', 'kitty/kitty.conf'), 'replace'],
      ['waybar', '/custom/waybar.css', 'replace'],
      ['hyprland', path.join('/cfg', 'hypr/hyprland.conf'), 'block'],
    ]);
    expect(plans[0].content).toBe(generate(theme, 'kitty'));
  });

  it('writes Home Manager modules under the nix method', () => {
    const { plans } = resolveTargets(theme, { ...settings, deploymentMethod: 'nix' }, { targets: ['kitty'] });
    expect(plans).toEqual([
      {
        target: 'kitty',
        path: path.join('/nix-out', 'kitty.nix'),
        content: renderHomeManagerModule(theme, 'kitty'),
        strategy: 'replace',
      },
    ]);
  });

  it('covers every deployable target by default', () => {
    const { plans } = resolveTargets(theme, settings);
    expect(plans).toHaveLength(15);
    expect(plans.map((p) => p.target)).not.toContain('nix');
  });
});

describe('managedDirectories', () => {
  const settings: ResolvedSettings = {
    deploymentMethod: 'standard',
    themesDir: '/themes',
    configDir: '/cfg',
    appPaths: { waybar: '/custom/waybar.css' },
    nixOutputPath: '/nix-out',
  };

  it('lists each destination directory once', () => {
    const dirs = managedDirectories(settings);
    expect(dirs).toContain(path.join('/cfg', 'hypr'));
    expect(dirs).toContain(path.join('/cfg', 'nvim', 'colors'));
    expect(dirs).toContain('/cfg');
    expect(dirs).toContain('/custom');
    expect(dirs).not.toContain(path.join('/cfg', 'waybar'));
    expect(dirs.filter((d) => d === path.join('/cfg', 'hypr'))).toHaveLength(1);
  });

  it('uses only the output path under the nix method', () => {
    expect(managedDirectories({ ...settings, deploymentMethod: 'nix' })).toEqual(['/nix-out']);
  });
});

describe('selectTargets', () => {
  it('normalizes and de-duplicates names', () => {
    expect(selectTargets(['Kitty', 'kitty', 'waybar'])).toEqual(['kitty', 'waybar']);
  });

  it('rejects unknown names', () => {
    expect(() => selectTargets(['kitty', 'alacritty'])).toThrow(UnknownGeneratorError);
  });

  it('rejects nix as a deployment target', () => {
    expect(() => selectTargets(['nix'])).toThrow(HuectlError);
  });
});
