/**
 * Batch contract validation
 *
 * Runs every contract below a root through the same pipeline a server
 * would (validator chain, parser, model generation, route table) and
 * prints a pass/fail report.
 */

import { findContractFiles } from './contract-loader.js';
import { getErrorDetails } from './errors.js';
import type { Logger } from './logger.js';
import { SilentLogger } from './logger.js';
import { SpecRouter } from './spec-router.js';
import { DefaultValidator, type ValidatorConstructor } from './validator/core.js';

const LINE_WIDTH = 79;

export interface ContractResult {
  path: string;
  passed: boolean;
  error?: Error;
}

export interface BatchReport {
  root: string;
  total: number;
  passed: number;
  failed: number;
  results: ContractResult[];
}

export interface BatchOptions {
  validators?: ValidatorConstructor[];
  strictValidation?: boolean;
  /** Keep each contract's declaration artifact in the temp dir */
  keepGeneratedModels?: boolean;
  formatCode?: boolean;
  logger?: Logger;
  /** Receives report lines (default: stdout) */
  print?: (line: string) => void;
}

function dashes(char: string = '='): string {
  return char.repeat(LINE_WIDTH);
}

function describeError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function validateContracts(root: string, options: BatchOptions = {}): BatchReport {
  const print = options.print ?? ((line: string) => console.log(line));
  const logger = options.logger ?? new SilentLogger();
  const validators = options.validators ?? [];
  const names = [DefaultValidator, ...validators.filter(v => v !== DefaultValidator)].map(v => v.name);

  print(dashes());
  print(`Contracts root: ${root}`);
  print(`Validators: ${names.join(', ')}`);
  print(dashes());

  const results: ContractResult[] = [];
  for (const contractPath of findContractFiles(root)) {
    print(`File: ${contractPath}`);
    try {
      new SpecRouter(contractPath, {
        validators,
        strictValidation: options.strictValidation,
        keepGeneratedModels: options.keepGeneratedModels,
        formatCode: options.formatCode,
        logger,
      }).build();
      print('[PASSED]');
      results.push({ path: contractPath, passed: true });
    } catch (error) {
      const failure = describeError(error);
      logger.debug('Contract failed', { contractPath, ...getErrorDetails(error) });
      print(`${failure.name}: ${failure.message}`);
      print('[FAILED]');
      results.push({ path: contractPath, passed: false, error: failure });
    }
    print(dashes('-'));
  }

  const passed = results.filter(result => result.passed).length;
  const report: BatchReport = {
    root,
    total: results.length,
    passed,
    failed: results.length - passed,
    results,
  };

  print(dashes());
  print('Summary:');
  print(`Total : ${report.total}`);
  print(`Passed: ${report.passed}`);
  print(`Failed: ${report.failed}`);
  print(dashes());

  return report;
}

export function exitCodeFor(report: BatchReport): number {
  return report.failed > 0 ? 1 : 0;
}
