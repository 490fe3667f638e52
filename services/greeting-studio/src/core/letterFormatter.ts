export interface LetterClosing {
  readonly salutation: string;
  readonly attribution: string;
  readonly signature: string;
}

export interface FormattedLetter {
  readonly salutation: string | null;
  readonly paragraphs: readonly string[];
  readonly closing: LetterClosing;
}

export const LETTER_CLOSING: LetterClosing = Object.freeze({
  salutation: 'Tot gauw',
  attribution: 'Hoogachtend',
  signature: 'Sinterklaas',
});

// Longest template first so "Tot gauw, Hoogachtend, Sinterklaas" is never
// left half-stripped by the shorter variants.
const SIGN_OFF_PATTERNS: readonly RegExp[] = [
  /tot\s+gauw[,\s]*hoogachtend[,\s]*sinterklaas[\s.!,]*$/i,
  /tot\s+gauw[,\s]*hoogachtend[\s.!,]*$/i,
  /hoogachtend[,\s]*sinterklaas[\s.!,]*$/i,
];

function stripSignOff(text: string): string {
  let result = text.trimEnd();
  for (const pattern of SIGN_OFF_PATTERNS) {
    result = result.replace(pattern, '').trimEnd();
  }
  return result;
}

export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

/**
 * Bucket the body sentences into at most three paragraphs:
 * 1-2 sentences make one, 3-4 make two (2 + rest), 5 or more make three (2, 2, rest).
 */
export function groupParagraphs(sentences: readonly string[]): string[] {
  if (sentences.length === 0) return [];
  if (sentences.length <= 2) return [sentences.join(' ')];
  if (sentences.length <= 4) {
    return [sentences.slice(0, 2).join(' '), sentences.slice(2).join(' ')];
  }
  return [
    sentences.slice(0, 2).join(' '),
    sentences.slice(2, 4).join(' '),
    sentences.slice(4).join(' '),
  ];
}

export function formatLetter(raw: string): FormattedLetter {
  const cleaned = stripSignOff(raw).replace(/\s+/g, ' ').trim();
  const sentences = splitSentences(cleaned);
  const [first, ...body] = sentences;

  return Object.freeze({
    salutation: first === undefined ? null : first.replace(/,+$/, ''),
    paragraphs: Object.freeze(groupParagraphs(body)),
    closing: LETTER_CLOSING,
  });
}
