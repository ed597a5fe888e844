/**
 * Shared test fixtures
 *
 * Contract files live under `data/`; in-memory documents are built with
 * standardsContract() and tweaked per test.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';

export const DATA_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'data');
export const DEFINITIONS_DIR = path.join(DATA_DIR, 'definitions');
export const STANDARDS_DIR = path.join(DATA_DIR, 'standards');
export const INVALID_DIR = path.join(DATA_DIR, 'invalid');
export const VALIDATOR_MODULE = path.join(path.dirname(fileURLToPath(import.meta.url)), 'validator-module.ts');

export function definition(name: string): string {
  return path.join(DEFINITIONS_DIR, name);
}

type Json = Record<string, unknown>;

/**
 * A contract that passes StandardsValidator
 */
export function standardsContract(): Json {
  return {
    openapi: '3.0.2',
    info: { title: 'Draft contract', version: '0.1.0' },
    paths: {
      '/Draft/Contract': {
        post: {
          parameters: [
            { name: 'authorization', in: 'header', required: true, schema: { type: 'string' } },
            { name: 'x-authorization-provider', in: 'header', required: true, schema: { type: 'string' } },
          ],
          requestBody: {
            content: { 'application/json': { schema: { $ref: '#/components/schemas/DraftRequest' } } },
          },
          responses: {
            '200': {
              description: 'Successful Response',
              content: { 'application/json': { schema: { $ref: '#/components/schemas/DraftResponse' } } },
            },
          },
        },
      },
    },
    components: {
      schemas: {
        DraftRequest: { type: 'object', properties: { query: { type: 'string' } } },
        DraftResponse: { type: 'object', properties: { result: { type: 'string' } } },
      },
    },
  };
}

/**
 * Single-path contract around the given component schemas
 */
export function modelContract(schemas: Json, info: Json = {}): Json {
  return {
    openapi: '3.0.2',
    info: { title: 'Models', version: '1.0.0', ...info },
    paths: {},
    components: { schemas },
  };
}

/**
 * Fresh temp directory, removed by the returned cleanup function
 */
export function tempDir(prefix: string = 'contract-router-'): { dir: string; cleanup: () => void } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  return { dir, cleanup: () => fs.rmSync(dir, { recursive: true, force: true }) };
}

export function writeJson(dir: string, name: string, value: unknown): string {
  const filePath = path.join(dir, name);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(value, null, 2));
  return filePath;
}
