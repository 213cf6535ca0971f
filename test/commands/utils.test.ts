import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { parseJsonObject, readContentFromFileOrValue } from '../../src/commands/utils.js';
import { ValidationError } from '../../src/utils/errors.js';
import { createTestDataDir, removeTestDataDir } from '../fixtures/index.js';

describe('Command utils', () => {
  let dir: string;

  beforeEach(async () => {
    dir = createTestDataDir();
    await fs.mkdir(dir, { recursive: true });
  });

  afterEach(() => {
    removeTestDataDir(dir);
  });

  describe('readContentFromFileOrValue', () => {
    it('should return plain values unchanged', () => {
      expect(readContentFromFileOrValue('{"a":1}')).toBe('{"a":1}');
    });

    it('should read @file references', async () => {
      const file = path.join(dir, 'params.json');
      await fs.writeFile(file, '  {"imageName":"alpine"}\n', 'utf8');

      expect(readContentFromFileOrValue(`@${file}`)).toBe('{"imageName":"alpine"}');
    });

    it('should report unreadable files as validation errors', () => {
      const file = path.join(dir, 'missing.json');

      expect(() => readContentFromFileOrValue(`@${file}`)).toThrow(`Failed to read file '${file}'`);
    });
  });

  describe('parseJsonObject', () => {
    it('should parse JSON objects', () => {
      expect(parseJsonObject('{"tag":"v1","quiet":true}')).toEqual({ tag: 'v1', quiet: true });
    });

    it('should reject arrays and scalars', () => {
      expect(() => parseJsonObject('[1,2]', 'params')).toThrow('Invalid params: expected a JSON object');
      expect(() => parseJsonObject('42')).toThrow('Invalid JSON: expected a JSON object');
    });

    it('should reject malformed JSON', () => {
      expect(() => parseJsonObject('{nope', 'params')).toThrow(ValidationError);
    });
  });
});
