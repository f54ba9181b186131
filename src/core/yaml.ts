/**
 * YAML files in the data directory.
 */

import { readFileSync } from 'node:fs';
import { parseDocument } from 'yaml';

/**
 * Read and parse one YAML document. Throws the first parse error,
 * which carries its line and column. An empty file reads as `{}`.
 */
export function readYamlFile(path: string): unknown {
  const doc = parseDocument(readFileSync(path, 'utf-8'));
  const [first] = doc.errors;
  if (first) throw first;

  const value: unknown = doc.toJS();
  return value ?? {};
}
