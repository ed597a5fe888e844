/**
 * Contract file loading
 *
 * Reads a contract from disk and parses it as JSON, or as YAML for
 * `.yaml`/`.yml` files. Loading is synchronous: a contract load is a
 * one-shot build step, not a request path.
 */

import fg from 'fast-glob';
import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { InvalidJSONError } from './errors.js';
import type { ContractDocument, ContractSource } from './types/contract.js';
import { deepFreeze, isRecord } from './validation-utils.js';

function isYamlPath(contractPath: string): boolean {
  return contractPath.endsWith('.yaml') || contractPath.endsWith('.yml');
}

/**
 * Parse contract text into a frozen document
 *
 * Without a file name hint the text is tried as JSON first and as YAML
 * second. The result must be a mapping.
 */
export function parseContractText(raw: string, source: string = '<inline>'): ContractDocument {
  let parsed: unknown;
  try {
    if (isYamlPath(source)) {
      parsed = parseYaml(raw);
    } else if (source === '<inline>') {
      parsed = parseJsonOrYaml(raw);
    } else {
      parsed = JSON.parse(raw);
    }
  } catch (error) {
    throw new InvalidJSONError(source, error instanceof Error ? error.message : String(error));
  }

  if (!isRecord(parsed)) {
    throw new InvalidJSONError(source, 'document is not an object');
  }

  return deepFreeze(parsed);
}

function parseJsonOrYaml(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return parseYaml(raw);
  }
}

export function loadContract(contractPath: string): ContractSource {
  const raw = fs.readFileSync(contractPath, 'utf-8');
  return {
    path: contractPath,
    raw,
    document: parseContractText(raw, contractPath),
  };
}

/**
 * The file itself, or every `*.json` contract below a directory (sorted)
 */
export function findContractFiles(root: string): string[] {
  if (fs.statSync(root).isFile()) {
    return [root];
  }
  return fg
    .sync('**/*.json', { cwd: root, absolute: true })
    .sort()
    .map(file => path.normalize(file));
}
