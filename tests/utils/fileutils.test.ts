/**
 * 文件工具单元测试
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import {
  appendLines,
  readTextIfExists,
  renderPathTemplate,
  sanitizeSegment,
  sortKeysDeep,
  writeJsonAtomic,
} from '../../utils/fileutils';

describe('fileutils', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fileutils-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('sanitizeSegment keeps safe characters', () => {
    expect(sanitizeSegment('  Rust / Remote!! ')).toBe('rust-remote');
    expect(sanitizeSegment('***')).toBe('run');
  });

  test('renderPathTemplate inserts a local timestamp', () => {
    const date = new Date(2026, 0, 5, 9, 3, 7);

    expect(renderPathTemplate('out/run_metrics_{timestamp}.json', date)).toBe('out/run_metrics_20260105_090307.json');
    expect(renderPathTemplate('plain.json', date)).toBe('plain.json');
  });

  test('sortKeysDeep sorts nested objects and keeps arrays in order', () => {
    const sorted = sortKeysDeep({ b: 1, a: { d: [{ z: 1, y: 2 }], c: 2 } });

    expect(JSON.stringify(sorted)).toBe('{"a":{"c":2,"d":[{"y":2,"z":1}]},"b":1}');
  });

  test('writeJsonAtomic creates parents and leaves no temp file', async () => {
    const target = path.join(dir, 'a', 'b', 'doc.json');

    await writeJsonAtomic(target, { ok: true });

    expect(JSON.parse(fs.readFileSync(target, 'utf-8'))).toEqual({ ok: true });
    expect(fs.readdirSync(path.dirname(target))).toEqual(['doc.json']);
  });

  test('appendLines appends newline-terminated lines', async () => {
    const target = path.join(dir, 'log.jsonl');

    await appendLines(target, ['one']);
    await appendLines(target, ['two', 'three']);
    await appendLines(target, []);

    expect(fs.readFileSync(target, 'utf-8')).toBe('one\ntwo\nthree\n');
  });

  test('readTextIfExists returns null for missing files', async () => {
    expect(await readTextIfExists(path.join(dir, 'missing.txt'))).toBeNull();
    await expect(readTextIfExists(dir)).rejects.toThrow();
  });
});
