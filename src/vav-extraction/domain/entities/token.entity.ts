export interface BoundingBox {
  readonly x0: number;
  readonly y0: number;
  readonly x1: number;
  readonly y1: number;
}

/**
 * A run of embedded PDF text with its position on the page.
 *
 * Coordinates are PDF points, origin top-left, y grows downward.
 */
export interface Token {
  readonly text: string;
  readonly bbox: BoundingBox;
  readonly page: number; // zero-based
  readonly fontSize: number;
}

export function createToken(
  text: string,
  bbox: BoundingBox,
  page: number,
  fontSize: number,
): Token {
  return Object.freeze({
    text,
    bbox: Object.freeze({ x0: bbox.x0, y0: bbox.y0, x1: bbox.x1, y1: bbox.y1 }),
    page,
    fontSize,
  });
}
