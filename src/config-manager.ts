import * as path from 'node:path';
import { CONFIG_FILE_NAME } from './constants';
import { loadJsonFile, saveJsonFile } from './json-file-utils';
import Logger from './logger';
import type { AppConfig } from './types';
import { createConfigSchema } from './validators';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isConfigKey(key: string, defaults: AppConfig): key is keyof AppConfig {
  return key in defaults;
}

class ConfigManager {
  private configPath: string;

  constructor(dataDir: string) {
    this.configPath = path.join(dataDir, CONFIG_FILE_NAME);
  }

  getDefaults(): AppConfig {
    return {
      baseYear: 2019,
      targetYear: 2050,
      estimateMissingS3: false,
      companyWorkbook: 'companies.xlsx',
      productionBenchmark: 'benchmark-production.json',
      intensityBenchmark: 'benchmark-intensity.json',
      outputFile: 'results.json',
      logToFile: true
    };
  }

  /**
   * Read config.json, filling in missing keys with defaults.
   * Wrong-typed values and unknown keys are healed and the file rewritten.
   */
  loadConfig(): AppConfig {
    const defaults = this.getDefaults();
    try {
      const disk = loadJsonFile(this.configPath);
      if (disk === null) {
        this.saveConfig(defaults);
        return defaults;
      }
      if (!isPlainObject(disk)) {
        Logger.warn(`${CONFIG_FILE_NAME} is not an object; resetting to defaults`);
        this.saveConfig(defaults);
        return defaults;
      }

      const result: AppConfig = createConfigSchema(defaults).parse(disk);

      // Unknown keys, and known keys whose value was replaced
      let healed = Object.keys(disk).some((key) => !isConfigKey(key, defaults) || disk[key] !== result[key]);

      if (result.targetYear <= result.baseYear) {
        Logger.warn(`targetYear ${result.targetYear} is not after baseYear ${result.baseYear}; using the default horizon`);
        result.baseYear = defaults.baseYear;
        result.targetYear = defaults.targetYear;
        healed = true;
      }

      if (healed) this.saveConfig(result);
      return result;
    } catch (error) {
      Logger.error('Error loading config:', error);
      this.saveConfig(defaults);
      return defaults;
    }
  }

  saveConfig(config: AppConfig): void {
    saveJsonFile(this.configPath, config);
  }
}

export default ConfigManager;
