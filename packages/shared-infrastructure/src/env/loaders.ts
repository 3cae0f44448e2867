/**
 * Environment loading utilities shared by the CLIs and the worker.
 * Configuration is read once at startup; nothing here is consulted mid-job.
 */
import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';

import { parse } from 'dotenv';

export interface LoadEnvOptions {
  cwd?: string;
  files?: string[];
  override?: boolean;
  assignToProcess?: boolean;
}

export interface LoadEnvSummary {
  values: Record<string, string>;
  loadedFiles: string[];
  missingFiles: string[];
  assignedKeys: string[];
}

/**
 * Load variables from `.env`-style files. Later files win over earlier ones
 * only when `override` is set; existing process variables are kept unless
 * `override` is set.
 */
export function loadEnvFiles(options: LoadEnvOptions = {}): LoadEnvSummary {
  const cwd = resolve(options.cwd ?? process.cwd());
  const files = (options.files && options.files.length > 0 ? options.files : ['.env']).map(
    (file) => (isAbsolute(file) ? file : resolve(cwd, file)),
  );
  const override = options.override ?? false;
  const assignToProcess = options.assignToProcess ?? true;

  const values: Record<string, string> = {};
  const loadedFiles: string[] = [];
  const missingFiles: string[] = [];
  const assignedKeys = new Set<string>();

  for (const file of files) {
    if (!existsSync(file)) {
      missingFiles.push(file);
      continue;
    }
    loadedFiles.push(file);
    const parsed = parse(readFileSync(file, 'utf8'));

    for (const [key, value] of Object.entries(parsed)) {
      if (override || values[key] === undefined) {
        values[key] = value;
      }
      if (assignToProcess && (override || process.env[key] === undefined)) {
        process.env[key] = value;
        assignedKeys.add(key);
      }
    }
  }

  return { values, loadedFiles, missingFiles, assignedKeys: [...assignedKeys] };
}

export function readBool(name: string, def: boolean): boolean {
  const v = process.env[name];
  if (v == null || v === '') return def;
  return v === '1' || v.toLowerCase() === 'true';
}

export function readInt(name: string, def: number): number {
  const v = process.env[name];
  if (!v) return def;
  const n = Number(v);
  return Number.isInteger(n) ? n : def;
}

export function readString(name: string, def: string): string;
export function readString(name: string, def?: string): string | undefined;
export function readString(name: string, def?: string): string | undefined {
  const v = process.env[name];
  if (v == null || v === '') return def;
  return v;
}

/** First non-empty value among several alias names. */
export function readFirst(...names: string[]): string | undefined {
  for (const name of names) {
    const value = readString(name);
    if (value !== undefined) return value;
  }
  return undefined;
}
