/**
 * YamlDocumentIO - helpers shared by the declaration and state files
 */

import type * as YAML from 'yaml';

import { isRecord } from '../utilities/typeHelpers';
import type { FileSystemAdapter, IOLogger, SaveResult } from './types';
import { noopLogger } from './types';

/**
 * Checks if two values are structurally equal (ignoring key order)
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a !== typeof b) return false;
  if (a === null || b === null) return a === b;

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    return a.every((item, i) => deepEqual(item, b[i]));
  }

  if (isRecord(a) && isRecord(b)) {
    const aKeys = Object.keys(a).filter((key) => a[key] !== undefined).sort();
    const bKeys = Object.keys(b).filter((key) => b[key] !== undefined).sort();
    if (aKeys.length !== bKeys.length) return false;
    return aKeys.every((key, i) => key === bKeys[i] && deepEqual(a[key], b[key]));
  }

  return false;
}

/**
 * Write a YAML document, skipping the write when the file already holds
 * the same content.
 */
export async function writeYamlFile(
  doc: YAML.Document,
  filePath: string,
  fs: FileSystemAdapter,
  logger: IOLogger = noopLogger
): Promise<SaveResult> {
  try {
    const newContent = doc.toString();

    if (await fs.exists(filePath)) {
      const existingContent = await fs.readFile(filePath);
      if (existingContent === newContent) {
        logger.debug(`[YamlIO] No changes in ${filePath}, skipping write`);
        return { success: true };
      }
    }

    await fs.writeFile(filePath, newContent);
    logger.debug(`[YamlIO] Saved ${filePath}`);
    return { success: true };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: message };
  }
}
