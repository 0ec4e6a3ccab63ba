/**
 * The subset of pdf2json's JSON output the token extractor reads.
 * Positions and sizes are in page units of 16 points.
 */
export interface Pdf2JsonTextRun {
  /** Text, usually percent-encoded */
  T: string;
  /** [fontFaceId, fontSize, bold, italic] */
  TS?: number[];
}

export interface Pdf2JsonText {
  x: number;
  y: number;
  w?: number;
  R: Pdf2JsonTextRun[];
}

export interface Pdf2JsonPage {
  Width?: number;
  Height?: number;
  Texts?: Pdf2JsonText[];
}

export interface Pdf2JsonOutput {
  Pages: Pdf2JsonPage[];
  Meta?: Record<string, unknown>;
}

export interface Pdf2JsonParser {
  on(event: 'pdfParser_dataReady', listener: (data: unknown) => void): unknown;
  on(event: 'pdfParser_dataError', listener: (error: unknown) => void): unknown;
  parseBuffer(buffer: Buffer, verbosity?: number): void;
}

export type Pdf2JsonParserFactory = () => Pdf2JsonParser;

export function isPdf2JsonOutput(value: unknown): value is Pdf2JsonOutput {
  return (
    typeof value === 'object' &&
    value !== null &&
    'Pages' in value &&
    Array.isArray(value.Pages)
  );
}
