import {
  BadRequestException,
  Controller,
  HttpCode,
  HttpException,
  HttpStatus,
  InternalServerErrorException,
  Logger,
  Post,
  Query,
  Res,
  StreamableFile,
  UnprocessableEntityException,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { Throttle } from '@nestjs/throttler';
import {
  ApiBadRequestResponse,
  ApiBody,
  ApiConsumes,
  ApiOkResponse,
  ApiOperation,
  ApiProduces,
  ApiTags,
  ApiTooManyRequestsResponse,
  ApiUnprocessableEntityResponse,
} from '@nestjs/swagger';
import { Response } from 'express';
import {
  VavReportService,
  XLSX_MIME_TYPE,
  reportFileName,
} from '../report/vav-report.service';
import { ExtractionResult } from './domain/entities/diagnostic.entity';
import { DocumentReadError } from './domain/errors/extraction.errors';
import { ExtractionQueryDto } from './dto/extraction-query.dto';
import { ExtractionResponseDto } from './dto/extraction-response.dto';
import { VavExtractionService } from './vav-extraction.service';

const PDF_MIME_TYPES = ['application/pdf', 'application/x-pdf'];

function pdfFileFilter(
  _req: unknown,
  file: { mimetype: string; originalname: string },
  callback: (error: Error | null, acceptFile: boolean) => void,
): void {
  const isPdf =
    PDF_MIME_TYPES.includes(file.mimetype) ||
    (file.mimetype === 'application/octet-stream' &&
      /\.pdf$/i.test(file.originalname));

  if (!isPdf) {
    return callback(
      new BadRequestException(
        `Invalid file type ${file.mimetype}. Upload a PDF drawing set`,
      ),
      false,
    );
  }

  callback(null, true);
}

const UPLOAD_BODY = {
  schema: {
    type: 'object',
    properties: {
      file: {
        type: 'string',
        format: 'binary',
        description: 'Mechanical drawing set (PDF with embedded text)',
      },
    },
    required: ['file'],
  },
};

/**
 * VAV Extraction Controller
 *
 * Uploads are processed in memory and never stored. A client that drops the
 * connection cancels pending language model calls.
 */
@ApiTags('VAV Extraction')
@Controller({ path: 'extractions', version: '1' })
export class VavExtractionController {
  private readonly logger = new Logger(VavExtractionController.name);

  constructor(
    private readonly vavExtractionService: VavExtractionService,
    private readonly reportService: VavReportService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 10, ttl: 60000 } })
  @ApiOperation({ summary: 'Extract VAV box schedule data from a PDF' })
  @ApiConsumes('multipart/form-data')
  @ApiBody(UPLOAD_BODY)
  @ApiOkResponse({ type: ExtractionResponseDto })
  @ApiBadRequestResponse({ description: 'Missing or non-PDF upload' })
  @ApiUnprocessableEntityResponse({ description: 'PDF could not be read' })
  @ApiTooManyRequestsResponse({ description: 'Too many requests' })
  @UseInterceptors(FileInterceptor('file', { fileFilter: pdfFileFilter }))
  async extract(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Query() query: ExtractionQueryDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<ExtractionResponseDto> {
    const result = await this.run(file, query, res);
    return this.vavExtractionService.toResponseDto(result);
  }

  @Post('report')
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 10, ttl: 60000 } })
  @ApiOperation({ summary: 'Extract VAV boxes and download an Excel takeoff' })
  @ApiConsumes('multipart/form-data')
  @ApiBody(UPLOAD_BODY)
  @ApiProduces(XLSX_MIME_TYPE)
  @ApiOkResponse({ description: 'Workbook with VAV Summary and Diagnostics sheets' })
  @ApiBadRequestResponse({ description: 'Missing or non-PDF upload' })
  @ApiUnprocessableEntityResponse({ description: 'PDF could not be read' })
  @UseInterceptors(FileInterceptor('file', { fileFilter: pdfFileFilter }))
  async report(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Query() query: ExtractionQueryDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<StreamableFile> {
    const result = await this.run(file, query, res);
    const workbook = await this.reportService.generateWorkbook(result, {
      sourceFileName: file?.originalname,
    });

    return new StreamableFile(workbook, {
      type: XLSX_MIME_TYPE,
      disposition: `attachment; filename="${reportFileName(file?.originalname)}"`,
      length: workbook.length,
    });
  }

  private async run(
    file: Express.Multer.File | undefined,
    query: ExtractionQueryDto,
    res: Response,
  ): Promise<ExtractionResult> {
    if (!file) {
      throw new BadRequestException('File is required');
    }

    this.logger.log(
      `[EXTRACT] Request received: fileName=${file.originalname}, fileSize=${file.size}`,
    );

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    try {
      return await this.vavExtractionService.extract(file.buffer, {
        signal: controller.signal,
        settings: {
          useLanguageModel: query.useLanguageModel,
          estimateInletFromCfm: query.estimateInletFromCfm,
          neighborhoodRadius: query.neighborhoodRadius,
        },
      });
    } catch (error) {
      throw this.handleError(error);
    }
  }

  private handleError(error: unknown): HttpException {
    if (error instanceof DocumentReadError) {
      this.logger.warn(`[EXTRACT] Unreadable document: ${error.message}`);
      return new UnprocessableEntityException({
        status: HttpStatus.UNPROCESSABLE_ENTITY,
        ...error.toJSON(),
      });
    }

    if (error instanceof RangeError) {
      return new BadRequestException({
        status: HttpStatus.BAD_REQUEST,
        message: error.message,
      });
    }

    if (error instanceof HttpException) {
      return error;
    }

    this.logger.error(
      `[EXTRACT] Unexpected error: ${error instanceof Error ? error.message : 'Unknown'}`,
    );

    return new InternalServerErrorException({
      error: 'InternalError',
      message: 'An unexpected error occurred',
    });
  }
}
