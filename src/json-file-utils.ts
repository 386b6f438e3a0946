import * as fs from 'node:fs';
import * as path from 'node:path';
import Logger, { getErrorMessage } from './logger';

/** Load and parse a JSON file, returning null if missing or unparseable. Callers validate the shape. */
export function loadJsonFile(filePath: string): unknown {
  try {
    if (!fs.existsSync(filePath)) return null;
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    return parsed;
  } catch (err) {
    Logger.warn(`Could not load ${path.basename(filePath)}:`, getErrorMessage(err));
    return null;
  }
}

/** Save data as JSON to a file, creating parent directories if needed.
 *  Uses atomic write (temp file + rename) to prevent partial writes.
 *  Returns false when the file could not be written. */
export function saveJsonFile(filePath: string, data: unknown): boolean {
  try {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    const tmp = `${filePath}.tmp`;
    fs.writeFileSync(tmp, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
    fs.renameSync(tmp, filePath);
    return true;
  } catch (err) {
    Logger.warn(`Could not save ${path.basename(filePath)}:`, getErrorMessage(err));
    return false;
  }
}
