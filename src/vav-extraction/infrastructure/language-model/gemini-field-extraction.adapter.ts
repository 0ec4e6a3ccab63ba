import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { randomUUID } from 'crypto';
import { AllConfigType } from '../../../config/config.type';
import { isAbortError } from '../../domain/errors/extraction.errors';
import {
  LanguageModelFieldGuess,
  LanguageModelPort,
} from '../../domain/ports/language-model.port';
import { buildFieldExtractionPrompt } from './field-extraction.prompt';
import {
  GeminiGenerateContentResponseSchema,
  ModelFieldSetSchema,
} from './schemas/gemini-generate-content.schema';
import { UpstreamError } from './upstream-error';

/** Used when the model omits its certainty */
export const DEFAULT_MODEL_CERTAINTY = 0.5;

/**
 * Trims a model reply to its outermost JSON object and validates it.
 */
export function parseFieldGuess(reply: string): LanguageModelFieldGuess {
  const start = reply.indexOf('{');
  const end = reply.lastIndexOf('}');
  if (start < 0 || end <= start) {
    throw new Error('Language model reply contained no JSON object');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(reply.slice(start, end + 1));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Language model reply is not valid JSON: ${message}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Language model reply is not a JSON object');
  }

  const fields = plainToInstance(ModelFieldSetSchema, parsed);
  const errors = validateSync(fields);
  if (errors.length > 0) {
    throw new Error(
      `Language model reply failed validation: ${errors
        .map((error) => error.property)
        .join(', ')}`,
    );
  }

  return {
    boxId: fields.box_id ?? null,
    cfm: fields.cfm ?? null,
    inletSize: fields.inlet_size ?? null,
    certainty: fields.certainty ?? DEFAULT_MODEL_CERTAINTY,
  };
}

function replyTextOf(payload: unknown): string {
  if (typeof payload !== 'object' || payload === null) {
    throw new Error('Language model response is not a JSON object');
  }
  const response = plainToInstance(GeminiGenerateContentResponseSchema, payload);
  const errors = validateSync(response);
  if (errors.length > 0) {
    throw new Error('Language model response has an unexpected shape');
  }

  const text = (response.candidates?.[0]?.content?.parts ?? [])
    .map((part) => part.text ?? '')
    .join('');
  if (text.trim() === '') {
    throw new Error('Language model response contained no text');
  }
  return text;
}

/**
 * Gemini generateContent adapter for the language-model fallback.
 *
 * One request per neighborhood, JSON response mode, temperature 0.
 * Raw drawing text is never logged above debug level.
 */
@Injectable()
export class GeminiFieldExtractionAdapter implements LanguageModelPort {
  private readonly logger = new Logger(GeminiFieldExtractionAdapter.name);

  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  async extractFields(
    neighborhoodText: string,
    options: { signal?: AbortSignal } = {},
  ): Promise<LanguageModelFieldGuess> {
    const config = this.configService.getOrThrow('languageModel', {
      infer: true,
    });
    if (!config.apiKey) {
      throw new Error('Language model API key is not configured');
    }

    const path = `/v1beta/models/${encodeURIComponent(config.model)}:generateContent`;
    const requestId = randomUUID();
    const body = {
      contents: [
        {
          role: 'user',
          parts: [{ text: buildFieldExtractionPrompt(neighborhoodText) }],
        },
      ],
      generationConfig: {
        temperature: 0,
        responseMimeType: 'application/json',
      },
    };
    const startTime = Date.now();

    this.logger.debug(
      `[LanguageModel] POST ${path} | RequestId: ${requestId} | Text: ${neighborhoodText.substring(0, 80)}`,
    );

    let response: Response;
    try {
      response = await fetch(`${config.baseUrl}${path}`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': config.apiKey,
          'X-Request-Id': requestId,
        },
        body: JSON.stringify(body),
        signal: options.signal,
      });
    } catch (error) {
      if (isAbortError(error) || options.signal?.aborted) {
        throw error;
      }
      const upstreamError = UpstreamError.fromNetworkError(
        error instanceof Error ? error : new Error(String(error)),
        requestId,
        path,
      );
      this.logger.error(
        `[LanguageModel] Network error | RequestId: ${requestId} | Error: ${upstreamError.message}`,
      );
      throw upstreamError;
    }

    const duration = Date.now() - startTime;
    if (!response.ok) {
      const upstreamError = await UpstreamError.fromResponse(
        response,
        requestId,
        path,
      );
      this.logger.error(
        `[LanguageModel] Upstream error | Status: ${upstreamError.status} | Duration: ${duration}ms | RequestId: ${requestId} | Message: ${upstreamError.message}`,
      );
      throw upstreamError;
    }

    this.logger.debug(
      `[LanguageModel] Status: ${response.status} | Duration: ${duration}ms | RequestId: ${requestId}`,
    );

    const payload: unknown = await response.json();
    return parseFieldGuess(replyTextOf(payload));
  }
}
