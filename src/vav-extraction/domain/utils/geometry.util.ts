import { BoundingBox, Token } from '../entities/token.entity';

export function bboxUnion(a: BoundingBox, b: BoundingBox): BoundingBox {
  return {
    x0: Math.min(a.x0, b.x0),
    y0: Math.min(a.y0, b.y0),
    x1: Math.max(a.x1, b.x1),
    y1: Math.max(a.y1, b.y1),
  };
}

export function bboxOfTokens(tokens: readonly Token[]): BoundingBox {
  if (tokens.length === 0) {
    return { x0: 0, y0: 0, x1: 0, y1: 0 };
  }
  return tokens
    .slice(1)
    .reduce((acc, token) => bboxUnion(acc, token.bbox), tokens[0].bbox);
}

export function verticalCenter(bbox: BoundingBox): number {
  return (bbox.y0 + bbox.y1) / 2;
}

/**
 * Shortest distance between two rectangles, 0 when they touch or overlap.
 */
export function rectDistance(a: BoundingBox, b: BoundingBox): number {
  const dx = Math.max(0, b.x0 - a.x1, a.x0 - b.x1);
  const dy = Math.max(0, b.y0 - a.y1, a.y0 - b.y1);
  return Math.hypot(dx, dy);
}

export function stableSortBy<T>(items: readonly T[], key: (item: T) => number): T[] {
  return items
    .map((value, index) => ({ value, index, key: key(value) }))
    .sort((a, b) => a.key - b.key || a.index - b.index)
    .map((entry) => entry.value);
}

/**
 * Sort by vertical then horizontal position, stable for equal positions.
 */
export function sortByPosition(tokens: readonly Token[]): Token[] {
  return stableSortBy(
    stableSortBy(tokens, (token) => token.bbox.x0),
    (token) => token.bbox.y0,
  );
}

/**
 * Groups tokens into lines, top to bottom, each line left to right.
 *
 * A token joins the current line when its vertical center lies within half a
 * line height of the line's center.
 */
export function groupIntoLines(tokens: readonly Token[]): Token[][] {
  const sorted = stableSortBy(
    stableSortBy(tokens, (token) => token.bbox.x0),
    (token) => verticalCenter(token.bbox),
  );

  type LineAcc = { tokens: Token[]; center: number; height: number };
  const lines: LineAcc[] = [];

  for (const token of sorted) {
    const center = verticalCenter(token.bbox);
    const height = Math.max(token.bbox.y1 - token.bbox.y0, 0);
    const current = lines[lines.length - 1];

    if (
      current &&
      Math.abs(current.center - center) <= 0.5 * Math.max(current.height, height)
    ) {
      current.tokens.push(token);
      current.height = Math.max(current.height, height);
      continue;
    }
    lines.push({ tokens: [token], center, height });
  }

  return lines.map((line) => stableSortBy(line.tokens, (token) => token.bbox.x0));
}

export function readingOrder(tokens: readonly Token[]): Token[] {
  return groupIntoLines(tokens).flat();
}
