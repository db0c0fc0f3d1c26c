import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Lists the PDF files directly inside `folder`, sorted by filename so every
 * run enumerates the same order.
 */
export async function listPdfFiles(folder: string): Promise<string[]> {
  const entries = await fs.readdir(folder, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === '.pdf')
    .map((entry) => entry.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((name) => path.join(folder, name));
}

export function reviewFileName(now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `literature_review_${stamp}.md`;
}

/**
 * Writes `content` to a temp file beside `target` and renames it into place,
 * so readers only ever see a complete file. `beforeCommit` runs between the
 * two steps. If the write or `beforeCommit` throws, the temp file is removed
 * and nothing is written.
 */
export async function writeFileAtomic(
  target: string,
  content: string,
  beforeCommit?: () => void
): Promise<void> {
  const dir = path.dirname(target);
  await fs.mkdir(dir, { recursive: true });
  const tmp = path.join(dir, `.${path.basename(target)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await fs.writeFile(tmp, content, 'utf8');
    beforeCommit?.();
    await fs.rename(tmp, target);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
}
