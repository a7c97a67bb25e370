import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { exportContent, formatExportFilename } from './export';

describe('formatExportFilename', () => {
  it('stamps the content type with local date and time', () => {
    expect(formatExportFilename('blog_post', new Date(2026, 9, 18, 9, 5, 3))).toBe('blog_post_20261018_090503.md');
  });
});

describe('exportContent', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'export-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('creates the directory and writes the file', () => {
    const dir = path.join(root, 'nested', 'exports');

    const filePath = exportContent('# Hello\n\nWorld', 'email', dir, new Date(2026, 0, 2, 13, 14, 15));

    expect(filePath).toBe(path.join(dir, 'email_20260102_131415.md'));
    expect(fs.readFileSync(filePath, 'utf-8')).toBe('# Hello\n\nWorld');
  });
});
