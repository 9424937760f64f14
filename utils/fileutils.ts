/**
 * File helpers for run artifacts (checkpoints, logs, metrics documents).
 */

import { promises as fs } from 'fs';
import * as path from 'path';

const DEFAULT_IDENTIFIER = 'run';

/**
 * 简单清理文件路径片段，避免非法字符
 */
export function sanitizeSegment(segment: string = ''): string {
  return String(segment)
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9-_]+/gi, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-|-$/g, '') || DEFAULT_IDENTIFIER;
}

export async function ensureDirExists(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

/**
 * Writes JSON through a temp file and a rename, so readers only ever see the
 * previous document or the new one.
 */
export async function writeJsonAtomic(filePath: string, payload: unknown, space = 2): Promise<void> {
  await ensureDirExists(path.dirname(filePath));
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmpPath, JSON.stringify(payload, null, space), 'utf-8');
  await fs.rename(tmpPath, filePath);
}

export async function appendLines(filePath: string, lines: string[]): Promise<void> {
  if (lines.length === 0) return;
  await ensureDirExists(path.dirname(filePath));
  await fs.appendFile(filePath, lines.map((line) => `${line}\n`).join(''), 'utf-8');
}

/**
 * Reads a text file, returning `null` when it does not exist.
 */
export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && Reflect.get(error, 'code') === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Replaces `{timestamp}` in a path template with a local `YYYYMMDD_HHMMSS` stamp.
 */
export function renderPathTemplate(template: string, date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return template.replace(/\{timestamp\}/g, stamp);
}

/**
 * Copy of `value` with object keys sorted recursively, for stable JSON output.
 */
export function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeysDeep(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}
