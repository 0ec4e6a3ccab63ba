import {
  Token,
  createToken,
} from '../../domain/entities/token.entity';
import { Pdf2JsonPage, Pdf2JsonText } from './pdf2json.types';

export const PDF2JSON_UNIT_PT = 16;
export const DEFAULT_FONT_SIZE_PT = 10;
const CHAR_WIDTH_EM = 0.5;

/**
 * Decodes pdf2json's percent-encoded run text, keeping the raw text when it
 * is not valid percent-encoding (a literal "100%" for instance).
 */
export function decodeRunText(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

function fontSizeOf(text: Pdf2JsonText): number {
  const sizes = text.R.map((run) => run.TS?.[1]).filter(
    (size): size is number =>
      typeof size === 'number' && Number.isFinite(size) && size > 0,
  );
  return sizes.length > 0 ? Math.max(...sizes) : DEFAULT_FONT_SIZE_PT;
}

/**
 * Maps one pdf2json page to tokens in PDF points, origin top-left.
 * Whitespace-only runs and malformed entries are skipped.
 */
export function mapPdf2JsonPage(page: Pdf2JsonPage, pageIndex: number): Token[] {
  const tokens: Token[] = [];

  for (const text of page.Texts ?? []) {
    if (
      !Number.isFinite(text.x) ||
      !Number.isFinite(text.y) ||
      !Array.isArray(text.R)
    ) {
      continue;
    }

    const content = text.R.map((run) =>
      typeof run.T === 'string' ? decodeRunText(run.T) : '',
    )
      .join('')
      .replace(/\s+/g, ' ')
      .trim();
    if (content === '') {
      continue;
    }

    const fontSize = fontSizeOf(text);
    const x0 = text.x * PDF2JSON_UNIT_PT;
    const y0 = text.y * PDF2JSON_UNIT_PT;

    tokens.push(
      createToken(
        content,
        {
          x0,
          y0,
          x1: x0 + content.length * CHAR_WIDTH_EM * fontSize,
          y1: y0 + fontSize,
        },
        pageIndex,
        fontSize,
      ),
    );
  }

  return tokens;
}
