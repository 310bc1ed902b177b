import fs from 'node:fs'; import path from 'node:path';
import type { z } from 'zod';
import { StorageError } from '../errors';

export function ensureDir(dir: string) {
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (error) {
    throw new StorageError('Failed to create directory', dir, error);
  }
}

export function saveJSON(dir: string, name: string, obj: unknown) {
  ensureDir(dir);
  const file = path.join(dir, `${name}.json`);
  try {
    fs.writeFileSync(file, JSON.stringify(obj, null, 2), 'utf-8');
  } catch (error) {
    throw new StorageError('Failed to write', file, error);
  }
}

export function readJSON<S extends z.ZodTypeAny>(file: string, schema: S): z.output<S> {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    throw new StorageError('Failed to read', file, error);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new StorageError('Invalid JSON in', file, error);
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new StorageError(
      `Unexpected shape (${parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ')}) in`,
      file
    );
  }
  return parsed.data;
}

export function appendLine(file: string, line: string) {
  try {
    fs.appendFileSync(file, `${line}\n`, 'utf-8');
  } catch (error) {
    throw new StorageError('Failed to append to', file, error);
  }
}
