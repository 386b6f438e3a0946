#!/usr/bin/env node
// Command-line entry: score the companies of a data directory against its benchmarks
//
//   carbon-budget-scorer <dataDir> [companyId...]
//
// Reads config.json (created with defaults on first run) and writes the aggregates
// and issues to the configured output file inside <dataDir>.

import * as path from 'node:path';
import ConfigManager from './config-manager';
import { runScoring } from './data-pipeline';
import { saveJsonFile } from './json-file-utils';
import Logger from './logger';

const USAGE = 'Usage: carbon-budget-scorer <dataDir> [companyId...]';

/** Run the scorer; resolves to the process exit code */
export async function main(argv: string[]): Promise<number> {
  const [dataDir, ...companyIds] = argv;
  if (!dataDir) {
    console.error(USAGE);
    return 2;
  }

  const config = new ConfigManager(dataDir).loadConfig();
  if (config.logToFile) Logger.init(dataDir);

  try {
    const result = await runScoring(dataDir, config, companyIds);
    if (!result) {
      Logger.error('Input data could not be loaded; nothing scored');
      return 1;
    }
    const outputPath = path.join(dataDir, config.outputFile);
    if (!saveJsonFile(outputPath, result)) return 1;
    Logger.info(`Wrote ${result.aggregates.length} aggregates and ${result.issues.length} issues to ${outputPath}`);
    return 0;
  } finally {
    Logger.close();
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      Logger.error('Fatal error:', err);
      process.exitCode = 1;
    }
  );
}
