/**
 * Pattern rules shared by the heuristic classifier, the language-model
 * fallback and the validator.
 */

// VAV-12, VAVB5-01, VAV 3, FPB-2, CAV-1, TU-4
export const DEFAULT_BOX_ID_PATTERN =
  '\\b(?:VAVB?\\d*|FPVAV|FPB|CAV|TU)[ _-]?\\d+[A-Z]?\\b';

// Normalized sizes only: 10x8 or 10"
export const DEFAULT_INLET_SIZE_PATTERN = '^(?:\\d{1,2}x\\d{1,2}|\\d{1,2}")$';

const NUMBER = '(\\d{1,3}(?:,\\d{3})+|\\d+(?:\\.\\d+)?)';

export const CFM_VALUE_UNIT = new RegExp(
  `(?<![\\d.,])${NUMBER}\\s*CFM\\b`,
  'gi',
);
export const CFM_LABEL_VALUE = new RegExp(
  `\\b(?:CFM|AIRFLOW)\\b\\s*[:=]?\\s*${NUMBER}(?![\\d.])`,
  'gi',
);
export const DIMENSION_SIZE =
  /(?<![\d.])(\d{1,2})\s*(?:"|'')?\s*[x×]\s*(\d{1,2})\s*(?:"|'')?(?![\d.])/gi;
export const ROUND_SIZE_SUFFIX =
  /(?<![\d.])(\d{1,2})\s*(?:"|''|″|[Øø⌀]|IN(?:CH(?:ES)?)?\b)/gi;
export const ROUND_SIZE_PREFIX = /[Øø⌀]\s*(\d{1,2})(?![\d.])/g;

export const BARE_NUMBER = new RegExp(`^${NUMBER}$`);
export const FLOW_LABEL =
  /^(?:(?:MAX|MIN|DESIGN|SUPPLY|SA)\.?\s*)?(?:CFM|AIRFLOW|MAX|SA)[:.]?$/i;

export const BOX_ID_COLUMN = /\b(?:TAG|MARK)\b/i;
export const CFM_COLUMN = /\b(?:CFM|AIRFLOW)\b/i;
export const INLET_COLUMN = /\b(?:INLET|SIZE)\b/i;

/**
 * Uppercase, whitespace, underscores and dash variants folded to one '-'.
 */
export function normalizeBoxId(raw: string): string {
  return raw
    .trim()
    .toUpperCase()
    .replace(/[\s_\-\u2010-\u2015]+/g, '-');
}

/**
 * Parses `1,200`, `350` or `87.5`. Returns null for anything else.
 */
export function parseNumber(raw: string): number | null {
  const trimmed = raw.trim();
  if (!BARE_NUMBER.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed.replace(/,/g, ''));
  return Number.isFinite(value) ? value : null;
}

export function isInteger(raw: string): boolean {
  return /^(?:\d{1,3}(?:,\d{3})+|\d+)$/.test(raw.trim());
}

/**
 * Normalizes duct sizes to lowercase `WxH` or round `N"`.
 *
 * Accepts `10x8`, `12 X 10`, `14×8`, `10"`, `10 IN`, `10 inch`, `Ø10`, `10Ø`
 * and a bare `10`.
 */
export function normalizeInletSize(raw: string): string | null {
  const text = raw.trim();

  const dimension =
    /^(\d{1,2})\s*(?:"|'')?\s*[x×]\s*(\d{1,2})\s*(?:"|'')?$/i.exec(text);
  if (dimension) {
    return `${Number(dimension[1])}x${Number(dimension[2])}`;
  }

  const round =
    /^(?:[Øø⌀]\s*)?(\d{1,2})\s*(?:"|''|″|[Øø⌀]|IN(?:CH(?:ES)?)?\.?)?$/i.exec(
      text,
    );
  if (round) {
    return `${Number(round[1])}"`;
  }

  return null;
}

/**
 * Natural order: VAV-2 sorts before VAV-10.
 */
export function compareBoxIds(a: string, b: string): number {
  const left = a.split(/(\d+)/);
  const right = b.split(/(\d+)/);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    if (left[i] === right[i]) {
      continue;
    }
    // split() with a capture group puts digit runs at odd indices
    if (i % 2 === 1) {
      const diff = Number(left[i]) - Number(right[i]);
      return diff !== 0 ? diff : left[i].length - right[i].length;
    }
    return left[i] < right[i] ? -1 : 1;
  }
  return left.length - right.length;
}

/**
 * Replaces a matched span with spaces so later rules cannot match it again.
 */
export function blankSpan(text: string, start: number, length: number): string {
  return text.slice(0, start) + ' '.repeat(length) + text.slice(start + length);
}
