import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { loadEnvFiles, readBool, readFirst, readInt, readString } from '../src/env/loaders.js';

describe('env utilities', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('readBool', () => {
    it('returns default when env var is not set', () => {
      expect(readBool('NONEXISTENT_VAR', true)).toBe(true);
      expect(readBool('NONEXISTENT_VAR', false)).toBe(false);
    });

    it('accepts "1" and "true" in any case', () => {
      process.env.TEST_BOOL = '1';
      expect(readBool('TEST_BOOL', false)).toBe(true);
      process.env.TEST_BOOL = 'TRUE';
      expect(readBool('TEST_BOOL', false)).toBe(true);
    });

    it('returns false for other values', () => {
      process.env.TEST_BOOL = '0';
      expect(readBool('TEST_BOOL', true)).toBe(false);
      process.env.TEST_BOOL = 'no';
      expect(readBool('TEST_BOOL', true)).toBe(false);
    });
  });

  describe('readInt', () => {
    it('parses integers and falls back on junk', () => {
      process.env.TEST_INT = '123';
      expect(readInt('TEST_INT', 0)).toBe(123);
      process.env.TEST_INT = 'not a number';
      expect(readInt('TEST_INT', 42)).toBe(42);
      process.env.TEST_INT = '2.5';
      expect(readInt('TEST_INT', 7)).toBe(7);
    });

    it('returns default for empty string', () => {
      process.env.TEST_INT = '';
      expect(readInt('TEST_INT', 42)).toBe(42);
    });
  });

  describe('readString / readFirst', () => {
    it('treats empty strings as unset', () => {
      process.env.TEST_STRING = '';
      expect(readString('TEST_STRING', 'default')).toBe('default');
      expect(readString('NONEXISTENT_VAR')).toBeUndefined();
    });

    it('returns the first alias that is set', () => {
      delete process.env.FIRST_ALIAS;
      process.env.SECOND_ALIAS = 'second';
      process.env.THIRD_ALIAS = 'third';
      expect(readFirst('FIRST_ALIAS', 'SECOND_ALIAS', 'THIRD_ALIAS')).toBe('second');
      expect(readFirst('FIRST_ALIAS')).toBeUndefined();
    });
  });

  describe('loadEnvFiles', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = join(tmpdir(), `test-env-${Date.now()}-${Math.random().toString(36).slice(2)}`);
      mkdirSync(testDir, { recursive: true });
    });

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true });
    });

    it('loads variables from .env without touching process.env when disabled', () => {
      writeFileSync(join(testDir, '.env'), 'SPLAT_TEST_VAR=test_value\nANOTHER_VAR=another_value');
      delete process.env.SPLAT_TEST_VAR;

      const result = loadEnvFiles({ cwd: testDir, assignToProcess: false });

      expect(result.values.SPLAT_TEST_VAR).toBe('test_value');
      expect(result.values.ANOTHER_VAR).toBe('another_value');
      expect(process.env.SPLAT_TEST_VAR).toBeUndefined();
    });

    it('assigns new keys but keeps existing process variables', () => {
      process.env.EXISTING_VAR = 'original';
      delete process.env.FRESH_VAR;
      writeFileSync(join(testDir, '.env'), 'EXISTING_VAR=new_value\nFRESH_VAR=fresh');

      const result = loadEnvFiles({ cwd: testDir });

      expect(process.env.EXISTING_VAR).toBe('original');
      expect(process.env.FRESH_VAR).toBe('fresh');
      expect(result.assignedKeys).toEqual(['FRESH_VAR']);
    });

    it('overrides existing vars when override is true', () => {
      process.env.EXISTING_VAR = 'original';
      writeFileSync(join(testDir, '.env'), 'EXISTING_VAR=new_value');

      loadEnvFiles({ cwd: testDir, override: true });

      expect(process.env.EXISTING_VAR).toBe('new_value');
    });

    it('reports missing files', () => {
      const result = loadEnvFiles({ cwd: testDir, files: ['.env.local'] });
      expect(result.values).toEqual({});
      expect(result.loadedFiles).toEqual([]);
      expect(result.missingFiles).toEqual([join(testDir, '.env.local')]);
    });
  });
});
