/**
 * Reading plan documents and layered settings directories from disk.
 */

import { promises as fs } from 'fs';
import * as path from 'path';

import { parse as parseYaml } from 'yaml';

import { ConfigurationError, EnvironmentError } from '../errors.js';
import { isMissingFileError } from '../utils/files.js';
import { isPlainObject, mergeAll, type PlainObject } from '../utils/merge.js';

const DOCUMENT_EXTENSIONS = new Set(['.yml', '.yaml', '.json']);

/**
 * Parse YAML or JSON text (JSON is valid YAML). An empty document is `{}`.
 */
export function parsePlanText(text: string, source: string): PlainObject {
  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (err) {
    throw new ConfigurationError(`Cannot parse ${source}`, [
      { path: source, message: err instanceof Error ? err.message : String(err) }
    ]);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Cannot use ${source}`, [
      { path: source, message: 'top level must be a mapping' }
    ]);
  }
  return parsed;
}

export async function readPlanDocument(filePath: string): Promise<PlainObject> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read plan ${filePath}`, [
      { path: filePath, message: err instanceof Error ? err.message : String(err) }
    ]);
  }
  return parsePlanText(text, filePath);
}

/**
 * Read several plan files and merge them in command-line order.
 */
export async function readPlanDocuments(filePaths: string[]): Promise<PlainObject> {
  const documents: PlainObject[] = [];
  for (const filePath of filePaths) {
    documents.push(await readPlanDocument(filePath));
  }
  return mergeAll(documents);
}

/**
 * Merge every document in a settings directory in file-name order, so
 * `90-artifacts.json` is overridden by `99-local.yml`. A missing directory
 * contributes nothing.
 */
export async function loadSettingsDir(dir: string): Promise<PlainObject> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (err) {
    if (isMissingFileError(err)) {
      return {};
    }
    throw new EnvironmentError(`Cannot read settings directory ${dir}`, err);
  }

  const files = entries
    .filter(name => DOCUMENT_EXTENSIONS.has(path.extname(name).toLowerCase()))
    .sort((a, b) => a.localeCompare(b, 'en', { numeric: true }));

  return readPlanDocuments(files.map(name => path.join(dir, name)));
}
