import * as fs from 'fs';
import * as path from 'path';
import { ContentType } from '@/types';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

// {content_type}_{YYYYMMDD_HHMMSS}.md in local time
export function formatExportFilename(contentType: ContentType, date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${contentType}_${day}_${time}.md`;
}

/**
 * Write generated content to a markdown file and return its path.
 */
export function exportContent(
  content: string,
  contentType: ContentType,
  dir: string,
  now: Date = new Date()
): string {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const filePath = path.join(dir, formatExportFilename(contentType, now));
  fs.writeFileSync(filePath, content, 'utf-8');
  console.log(`Exported content to ${filePath}`);
  return filePath;
}
