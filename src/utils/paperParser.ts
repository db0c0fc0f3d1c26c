import * as fs from 'fs/promises';
import pdfParse from 'pdf-parse';
import type { ExtractedText, PaperMetadata } from '../pipeline/types';
import { cleanText } from './text';

function parseInfoYear(value: unknown): number | undefined {
  if (typeof value !== 'string') return undefined;
  // PDF dates look like D:20190412093000Z
  const match = value.match(/^(?:D:)?(\d{4})/);
  if (!match?.[1]) return undefined;
  const year = Number(match[1]);
  return year >= 1000 && year <= 9999 ? year : undefined;
}

function nonEmptyString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = cleanText(value);
  return trimmed || undefined;
}

export function metadataFromPdfInfo(info: unknown): PaperMetadata | undefined {
  if (!info || typeof info !== 'object') return undefined;
  const record: Record<string, unknown> = { ...info };

  const title = nonEmptyString(record.Title);
  const author = nonEmptyString(record.Author);
  const year = parseInfoYear(record.CreationDate);
  const authors = author
    ? author
        .split(/\s*(?:;|\band\b|&)\s*/)
        .map((name) => name.trim())
        .filter(Boolean)
    : undefined;

  if (!title && !authors && year === undefined) return undefined;
  return {
    ...(title ? { title } : {}),
    ...(authors && authors.length > 0 ? { authors } : {}),
    ...(year !== undefined ? { year } : {}),
  };
}

export async function parsePdfBuffer(buffer: Buffer): Promise<ExtractedText> {
  const data = await pdfParse(buffer);
  return {
    text: cleanText(data.text),
    metadata: metadataFromPdfInfo(data.info),
  };
}

/** TextExtractor backed by pdf-parse. */
export async function extractPdfText(filePath: string): Promise<ExtractedText> {
  const fileBuffer = await fs.readFile(filePath);
  return parsePdfBuffer(fileBuffer);
}
