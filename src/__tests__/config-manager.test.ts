import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import ConfigManager from '../config-manager';

let dataDir: string;

function configPath(): string {
  return path.join(dataDir, 'config.json');
}

function writeConfig(data: unknown): void {
  fs.writeFileSync(configPath(), JSON.stringify(data));
}

function readConfig(): unknown {
  return JSON.parse(fs.readFileSync(configPath(), 'utf8'));
}

beforeEach(() => {
  dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-manager-'));
});

afterEach(() => {
  fs.rmSync(dataDir, { recursive: true, force: true });
});

describe('ConfigManager', () => {
  it('creates the config file with defaults on first load', () => {
    const manager = new ConfigManager(dataDir);
    expect(manager.loadConfig()).toEqual(manager.getDefaults());
    expect(readConfig()).toEqual(manager.getDefaults());
  });

  it('heals wrong-typed values and drops unknown keys', () => {
    writeConfig({ baseYear: '2020', targetYear: 2040, estimateMissingS3: true, legacyOption: 1 });
    const manager = new ConfigManager(dataDir);
    const expected = { ...manager.getDefaults(), targetYear: 2040, estimateMissingS3: true };

    expect(manager.loadConfig()).toEqual(expected);
    expect(readConfig()).toEqual(expected);
  });

  it('leaves a valid file untouched', () => {
    const manager = new ConfigManager(dataDir);
    const config = { ...manager.getDefaults(), outputFile: 'scores.json' };
    writeConfig(config);
    const before = fs.readFileSync(configPath(), 'utf8');

    expect(manager.loadConfig()).toEqual(config);
    expect(fs.readFileSync(configPath(), 'utf8')).toBe(before);
  });

  it('restores the default horizon when the target year is not after the base year', () => {
    writeConfig({ baseYear: 2030, targetYear: 2025 });
    const config = new ConfigManager(dataDir).loadConfig();
    expect(config.baseYear).toBe(2019);
    expect(config.targetYear).toBe(2050);
  });

  it('resets a config that is not an object', () => {
    writeConfig([1, 2, 3]);
    const manager = new ConfigManager(dataDir);
    expect(manager.loadConfig()).toEqual(manager.getDefaults());
    expect(readConfig()).toEqual(manager.getDefaults());
  });
});
