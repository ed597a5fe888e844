/**
 * Companion file checks
 *
 * A published contract `Foo.json` ships with `Foo.md` (human-readable
 * documentation) and `Foo.jsonld` (linked-data description) in the same
 * directory.
 */

import fs from 'fs';
import path from 'path';
import { COMPANION_EXTENSIONS } from '../constants.js';
import {
  CompanionFileEmptyError,
  CompanionFileMalformedError,
  CompanionFileMissingError,
} from '../errors.js';
import type { ContractDocument } from '../types/contract.js';
import { isRecord } from '../validation-utils.js';
import { BaseValidator } from './core.js';
import { validateStandards } from './standards.js';

export function companionPath(contractPath: string, extension: string): string {
  const parsed = path.parse(contractPath);
  return path.join(parsed.dir, `${parsed.name}${extension}`);
}

function readCompanion(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw new CompanionFileMissingError(filePath);
  }
  const content = fs.readFileSync(filePath, 'utf-8');
  if (content.trim().length === 0) {
    throw new CompanionFileEmptyError(filePath);
  }
  return content;
}

export function validateCompanionFiles(contractPath: string): void {
  readCompanion(companionPath(contractPath, COMPANION_EXTENSIONS.HUMAN_READABLE));

  const linkedDataPath = companionPath(contractPath, COMPANION_EXTENSIONS.LINKED_DATA);
  const linkedData = readCompanion(linkedDataPath);
  let parsed: unknown;
  try {
    parsed = JSON.parse(linkedData);
  } catch (error) {
    throw new CompanionFileMalformedError(linkedDataPath, error instanceof Error ? error.message : 'invalid JSON');
  }
  if (!isRecord(parsed) || !('@context' in parsed)) {
    throw new CompanionFileMalformedError(linkedDataPath, 'missing "@context"');
  }
}

export class CompanionFilesValidator extends BaseValidator {
  validateSpec(_document: ContractDocument): void {
    validateCompanionFiles(this.contractPath);
  }
}

/**
 * House convention plus companion files
 */
export class StrictStandardsValidator extends BaseValidator {
  validateSpec(document: ContractDocument): void {
    validateStandards(document);
    validateCompanionFiles(this.contractPath);
  }
}
