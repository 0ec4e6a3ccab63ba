import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { Token } from '../../domain/entities/token.entity';
import {
  DocumentReadError,
  EmptyPageError,
} from '../../domain/errors/extraction.errors';
import {
  TokenDocument,
  TokenSourcePort,
} from '../../domain/ports/token-source.port';
import { readingOrder } from '../../domain/utils/geometry.util';
import { mapPdf2JsonPage } from './pdf2json-page.mapper';
import {
  Pdf2JsonOutput,
  Pdf2JsonParser,
  Pdf2JsonParserFactory,
  isPdf2JsonOutput,
} from './pdf2json.types';

export const PDF2JSON_PARSER_FACTORY = 'PDF2JSON_PARSER_FACTORY';

// pdf2json exports its parser class either directly, as .PDFParser or as .default
// eslint-disable-next-line @typescript-eslint/no-require-imports
const pdf2jsonModule: unknown = require('pdf2json');

function isParserCtor(value: unknown): value is new () => Pdf2JsonParser {
  return typeof value === 'function';
}

function resolveParserCtor(mod: unknown): new () => Pdf2JsonParser {
  if (isParserCtor(mod)) {
    return mod;
  }
  if (typeof mod === 'object' && mod !== null) {
    if ('PDFParser' in mod && isParserCtor(mod.PDFParser)) {
      return mod.PDFParser;
    }
    if ('default' in mod && isParserCtor(mod.default)) {
      return mod.default;
    }
  }
  throw new Error('pdf2json PDFParser constructor not found - check import');
}

const defaultParserFactory: Pdf2JsonParserFactory = () => {
  const PDFParserCtor = resolveParserCtor(pdf2jsonModule);
  return new PDFParserCtor();
};

// Verbose pdf.js output pdf2json writes through the global console
const NOISY_MESSAGES = [
  'Invalid XRef stream header',
  'pdfjs-code.js',
  'while reading XRef',
  'Error: Error:',
  'Setting up fake worker',
  'Unsupported: field.type',
  'NOT valid form element',
  'TT: ',
  'Warning: ',
];

function isNoise(args: unknown[]): boolean {
  const message = args.map((arg) => String(arg)).join(' ');
  return NOISY_MESSAGES.some((fragment) => message.includes(fragment));
}

/**
 * Filters known pdf2json noise out of console.error, console.log and
 * console.warn until the returned restore function runs. Anything written
 * outside that window, or through a console method captured before it
 * opened, still reaches the console.
 */
function silenceConsole(): { restore: () => void; suppressed: () => number } {
  const originalConsoleError = console.error;
  const originalConsoleLog = console.log;
  const originalConsoleWarn = console.warn;
  let count = 0;

  const filter =
    (original: (...args: unknown[]) => void) =>
    (...args: unknown[]) => {
      if (isNoise(args)) {
        count++;
        return;
      }
      original.apply(console, args);
    };

  console.error = filter(originalConsoleError);
  console.log = filter(originalConsoleLog);
  console.warn = filter(originalConsoleWarn);

  return {
    restore: () => {
      console.error = originalConsoleError;
      console.log = originalConsoleLog;
      console.warn = originalConsoleWarn;
    },
    suppressed: () => count,
  };
}

function errorMessageOf(errData: unknown): string {
  const error =
    typeof errData === 'object' && errData !== null && 'parserError' in errData
      ? errData.parserError
      : errData;
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Read-only view over pdf2json output. Pages are mapped on first access and
 * shared by every later reader.
 */
class Pdf2JsonTokenDocument implements TokenDocument {
  private readonly cache = new Map<number, readonly Token[]>();

  constructor(private readonly output: Pdf2JsonOutput) {}

  get pageCount(): number {
    return this.output.Pages.length;
  }

  tokens(pageIndex: number): Iterable<Token> {
    if (
      !Number.isInteger(pageIndex) ||
      pageIndex < 0 ||
      pageIndex >= this.pageCount
    ) {
      throw new DocumentReadError(
        `Page index ${pageIndex} is outside the document (${this.pageCount} pages)`,
      );
    }

    const tokens = this.pageTokens(pageIndex);
    if (tokens.length === 0) {
      throw new EmptyPageError(pageIndex);
    }

    return {
      *[Symbol.iterator]() {
        yield* tokens;
      },
    };
  }

  private pageTokens(pageIndex: number): readonly Token[] {
    let tokens = this.cache.get(pageIndex);
    if (!tokens) {
      tokens = Object.freeze(
        readingOrder(mapPdf2JsonPage(this.output.Pages[pageIndex], pageIndex)),
      );
      this.cache.set(pageIndex, tokens);
    }
    return tokens;
  }
}

/**
 * Token extractor backed by pdf2json.
 *
 * Only embedded text is read; image-only pages come out empty.
 *
 * @see https://github.com/modesty/pdf2json
 */
@Injectable()
export class Pdf2JsonTokenExtractorService implements TokenSourcePort {
  private readonly logger = new Logger(Pdf2JsonTokenExtractorService.name);
  private readonly createParser: Pdf2JsonParserFactory;

  constructor(
    @Optional()
    @Inject(PDF2JSON_PARSER_FACTORY)
    parserFactory?: Pdf2JsonParserFactory,
  ) {
    this.createParser = parserFactory ?? defaultParserFactory;
  }

  async open(pdf: Buffer): Promise<TokenDocument> {
    this.assertReadable(pdf);

    this.logger.debug(
      `[PDF2JSON] Buffer size: ${pdf.length} bytes, first bytes (hex): ${pdf.subarray(0, 8).toString('hex')}`,
    );

    const output = await this.parse(pdf);
    this.logger.log(`[PDF2JSON] Parse done: pages=${output.Pages.length}`);
    return new Pdf2JsonTokenDocument(output);
  }

  private assertReadable(pdf: Buffer): void {
    if (pdf.length === 0) {
      throw new DocumentReadError('Document is empty');
    }
    // Readers accept leading junk before the header within the first 1 KiB
    if (pdf.subarray(0, 1024).indexOf('%PDF-') < 0) {
      throw new DocumentReadError('Document is not a PDF (missing %PDF header)');
    }
    if (pdf.includes('/Encrypt')) {
      throw new DocumentReadError('Document is encrypted');
    }
  }

  private parse(pdf: Buffer): Promise<Pdf2JsonOutput> {
    const quiet = silenceConsole();

    return new Promise<Pdf2JsonOutput>((resolve, reject) => {
      // pdf.js warns about its fake worker while the parser is set up
      const parser = this.createParser();

      parser.on('pdfParser_dataError', (errData: unknown) => {
        const message = errorMessageOf(errData).substring(0, 200);
        this.logger.warn(`[PDF2JSON] PDF parsing failed: ${message}`);
        reject(
          new DocumentReadError(
            /password|encrypt/i.test(message)
              ? 'Document is encrypted'
              : `PDF parsing failed: ${message}`,
            { cause: errData },
          ),
        );
      });

      parser.on('pdfParser_dataReady', (data: unknown) => {
        if (!isPdf2JsonOutput(data)) {
          reject(new DocumentReadError('PDF parsing returned no pages'));
          return;
        }
        resolve(data);
      });

      try {
        parser.parseBuffer(pdf, 0);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        reject(
          new DocumentReadError(`PDF parsing failed: ${message}`, {
            cause: error,
          }),
        );
      }
    }).finally(() => {
      quiet.restore();
      const suppressed = quiet.suppressed();
      if (suppressed > 0) {
        this.logger.debug(
          `[PDF2JSON] Suppressed ${suppressed} verbose message(s) from pdf2json`,
        );
      }
    });
  }
}
