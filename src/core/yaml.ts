/**
 * YAML data files, parsed with the `yaml` package.
 */

import { readFileSync } from 'node:fs';
import { parse, YAMLParseError } from 'yaml';
import { ConfigurationError } from './errors.js';

/** Parse a YAML file; syntax errors name the file and position. */
export function readYaml(path: string): unknown {
  try {
    return parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new ConfigurationError(`Invalid ${path}: ${error.message}`);
    }
    throw error;
  }
}
