/**
 * Utilities for command processing
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { ValidationError } from '../utils/errors.js';
import { getErrorMessage } from '../types/index.js';

/**
 * Reads content from a file path if the value starts with '@', otherwise returns the value as-is
 */
export function readContentFromFileOrValue(value: string): string {
  if (value.startsWith('@')) {
    const filePath = value.slice(1);
    try {
      return readFileSync(resolve(filePath), 'utf-8').trim();
    } catch (error: unknown) {
      throw new ValidationError(`Failed to read file '${filePath}': ${getErrorMessage(error)}`);
    }
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON object argument, accepting `@file.json` references
 */
export function parseJsonObject(value: string, context: string = 'JSON'): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readContentFromFileOrValue(value));
  } catch (error: unknown) {
    if (error instanceof ValidationError) throw error;
    throw new ValidationError(`Invalid ${context}: ${getErrorMessage(error)}`);
  }
  if (!isPlainObject(parsed)) {
    throw new ValidationError(`Invalid ${context}: expected a JSON object`);
  }
  return parsed;
}
