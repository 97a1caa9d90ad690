/**
 * School SQL Guard - Policy File Loader
 */

import fs from 'fs';
import path from 'path';

import { parse as parseYaml } from 'yaml';

import { logConfig } from '../utils/logger.js';
import { ConfigError, errorMessage } from '../utils/types.js';

import { PolicyStore } from './store.js';

/**
 * Read a YAML or JSON policy file and build a PolicyStore from it
 */
export function loadPolicyFile(filePath: string): PolicyStore {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Policy file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  const extension = path.extname(filePath).toLowerCase();

  let document: unknown;
  try {
    if (extension === '.yaml' || extension === '.yml') {
      document = parseYaml(content);
    } else if (extension === '.json') {
      document = JSON.parse(content);
    } else {
      throw new ConfigError(`Unsupported policy file format: ${extension}`);
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    throw new ConfigError(`Failed to parse policy file ${filePath}: ${errorMessage(error)}`);
  }

  const store = PolicyStore.load(document);
  logConfig('Policy file loaded', { path: filePath });
  return store;
}
