import type { PaperMetadata } from '../pipeline/types';

const SURNAME_PARTICLES = new Set(['van', 'von', 'de', 'du', 'da', 'der', 'den', 'la', 'le', 'di', 'del']);
const NAME_SUFFIXES = /^(jr\.?|sr\.?|ii|iii|iv)$/i;
const MINOR_WORDS = new Set([
  'a', 'an', 'the', 'and', 'but', 'or', 'for', 'nor', 'on', 'at', 'to', 'from', 'by', 'in', 'of', 'with', 'via', 'vs',
]);
const MAX_LISTED_AUTHORS = 20;

function initialsOf(givenNames: string[]): string {
  return givenNames
    .map((given) =>
      given
        .split('-')
        .filter(Boolean)
        .map((part) => `${part.charAt(0).toUpperCase()}.`)
        .join('-')
    )
    .filter(Boolean)
    .join(' ');
}

/**
 * "Jane Q. Doe" -> "Doe, J. Q."; "Ludwig van Beethoven" -> "van Beethoven, L.";
 * "Doe, Jane" is taken as already surname-first.
 */
export function formatAuthorName(name: string): string {
  const normalized = name.replace(/\s+/g, ' ').trim();
  if (!normalized) return '';

  const commaIndex = normalized.indexOf(',');
  if (commaIndex > 0) {
    const surname = normalized.slice(0, commaIndex).trim();
    const given = normalized.slice(commaIndex + 1).trim().split(' ').filter(Boolean);
    const initials = initialsOf(given);
    return initials ? `${surname}, ${initials}` : surname;
  }

  const parts = normalized.split(' ');
  let suffix: string | undefined;
  const lastPart = parts[parts.length - 1];
  if (parts.length > 2 && lastPart && NAME_SUFFIXES.test(lastPart)) {
    suffix = lastPart;
    parts.pop();
  }
  if (parts.length === 1) return parts[0] ?? normalized;

  let surnameStart = parts.length - 1;
  while (surnameStart > 1 && SURNAME_PARTICLES.has((parts[surnameStart - 1] ?? '').toLowerCase())) {
    surnameStart--;
  }
  const surname = parts.slice(surnameStart).join(' ');
  const initials = initialsOf(parts.slice(0, surnameStart));
  const formatted = `${surname}, ${initials}`;
  return suffix ? `${formatted}, ${suffix}` : formatted;
}

export function formatAuthorList(authors: string[]): string {
  const formatted = authors.map(formatAuthorName).filter(Boolean);
  if (formatted.length === 0) return '';
  if (formatted.length === 1) return formatted[0] ?? '';
  if (formatted.length > MAX_LISTED_AUTHORS) {
    const head = formatted.slice(0, MAX_LISTED_AUTHORS - 1).join(', ');
    return `${head}, . . . ${formatted[formatted.length - 1]}`;
  }
  const head = formatted.slice(0, -1).join(', ');
  return `${head}, & ${formatted[formatted.length - 1]}`;
}

function capitalizeFirst(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

const TITLE_CASE_WORD = /^[A-Z][a-z]+(?:-[A-Za-z][a-z]*)*[,;:]?$/;

/**
 * Sentence-style title: the first word and the first word after a colon are
 * capitalized; other words written with only an initial capital are
 * lowercased. Acronyms and mixed-case words (BERT, mRNA, GPT-4) are kept.
 */
export function formatTitle(title: string): string {
  const words = title.replace(/\s+/g, ' ').trim().replace(/\.+$/, '').split(' ');
  let capitalizeNext = true;
  const cased = words.map((word) => {
    const lowered = MINOR_WORDS.has(word.toLowerCase()) || TITLE_CASE_WORD.test(word) ? word.toLowerCase() : word;
    const result = capitalizeNext ? capitalizeFirst(lowered) : lowered;
    capitalizeNext = word.endsWith(':');
    return result;
  });
  return cased.join(' ');
}

function terminate(text: string): string {
  return /[.?!]$/.test(text) ? text : `${text}.`;
}

export interface ApaCitation {
  text: string;
  degraded: boolean;
}

/**
 * APA 7 reference entry. Missing pieces are filled rather than rejected:
 * no year gives "(n.d.)", no title gives a bracketed description naming the
 * file, no authors moves the title into the author position.
 */
export function formatApaCitation(metadata: PaperMetadata, fileName: string): ApaCitation {
  const authors = formatAuthorList(metadata.authors ?? []);
  const title = metadata.title?.trim() ? formatTitle(metadata.title) : '';
  const date = metadata.year !== undefined ? `(${metadata.year}).` : '(n.d.).';
  const titlePart = title ? terminate(title) : `[Untitled document: ${fileName}].`;
  const degraded = !authors || !title || metadata.year === undefined;

  if (!authors) {
    return { text: `${titlePart} ${date}`, degraded };
  }
  return { text: `${terminate(authors)} ${date} ${titlePart}`, degraded };
}
