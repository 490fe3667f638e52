import { readFile } from 'fs/promises';
import { dirname, extname, resolve } from 'path';
import { fileURLToPath } from 'url';
import type { FormattedLetter } from './letterFormatter.js';

const DEFAULT_STYLESHEET = resolve(dirname(fileURLToPath(import.meta.url)), '../../assets/letter.css');

const IMAGE_MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
};

const dutchDate = new Intl.DateTimeFormat('nl-NL', { day: '2-digit', month: 'long', year: 'numeric' });

export function formatDutchDate(date: Date): string {
  return dutchDate.format(date);
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export interface LetterRendererOptions {
  backgroundPath?: string;
  stylesheetPath?: string;
}

export interface RenderLetterOptions {
  date?: Date;
  title?: string;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Turns a formatted letter into one self-contained HTML page. The stylesheet
 * and the parchment background are inlined so the page prints without any
 * other file next to it.
 */
export class LetterRenderer {
  private stylesheet?: Promise<string>;
  private background?: Promise<string | undefined>;

  constructor(private readonly options: LetterRendererOptions = {}) {}

  async render(letter: FormattedLetter, options: RenderLetterOptions = {}): Promise<string> {
    const [css, backgroundUrl] = await Promise.all([this.loadStylesheet(), this.loadBackground()]);

    const lines: string[] = [];
    if (letter.salutation) {
      lines.push(`    <p class="greeting">${escapeHtml(letter.salutation)}</p>`);
    }
    letter.paragraphs.forEach((paragraph, index) => {
      lines.push(`    <p class="paragraph-${index + 1}">${escapeHtml(paragraph)}</p>`);
    });
    lines.push(`    <p class="closing">${escapeHtml(letter.closing.salutation)}</p>`);
    lines.push(`    <p class="signature-line">${escapeHtml(letter.closing.attribution)}</p>`);
    lines.push(`    <p class="signature-name">${escapeHtml(letter.closing.signature)}</p>`);

    const containerStyle = backgroundUrl ? ` style="background-image: url('${backgroundUrl}')"` : '';

    return [
      '<!DOCTYPE html>',
      '<html lang="nl">',
      '<head>',
      '  <meta charset="utf-8">',
      `  <title>${escapeHtml(options.title ?? 'Brief van Sinterklaas')}</title>`,
      `  <style>\n${css}\n  </style>`,
      '</head>',
      '<body>',
      `  <div class="letter-container"${containerStyle}>`,
      `    <div class="letter-date">${escapeHtml(formatDutchDate(options.date ?? new Date()))}</div>`,
      ...lines,
      '  </div>',
      '</body>',
      '</html>',
      '',
    ].join('\n');
  }

  private loadStylesheet(): Promise<string> {
    this.stylesheet ??= readFile(this.options.stylesheetPath ?? DEFAULT_STYLESHEET, 'utf8').catch((error: unknown) => {
      this.stylesheet = undefined;
      throw error;
    });
    return this.stylesheet;
  }

  private loadBackground(): Promise<string | undefined> {
    this.background ??= this.readBackground().catch((error: unknown) => {
      this.background = undefined;
      throw error;
    });
    return this.background;
  }

  private async readBackground(): Promise<string | undefined> {
    const path = this.options.backgroundPath;
    if (!path) return undefined;

    try {
      const image = await readFile(path);
      const mimeType = IMAGE_MIME_TYPES[extname(path).toLowerCase()] ?? 'image/png';
      return `data:${mimeType};base64,${image.toString('base64')}`;
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      console.warn(`[greeting-studio] letter background not found path=${path}; rendering without it`);
      return undefined;
    }
  }
}
