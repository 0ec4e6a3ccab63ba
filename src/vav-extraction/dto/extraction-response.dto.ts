import { ApiProperty } from '@nestjs/swagger';
import { Expose, Type } from 'class-transformer';
import { DiagnosticResponseDto } from './diagnostic-response.dto';
import { VavRecordResponseDto } from './vav-record-response.dto';

export class ExtractionSummaryResponseDto {
  @ApiProperty()
  @Expose()
  pageCount!: number;

  @ApiProperty()
  @Expose()
  recordCount!: number;

  @ApiProperty()
  @Expose()
  completeRecordCount!: number;

  @ApiProperty({ description: 'Fraction of records with all three fields' })
  @Expose()
  completeness!: number;

  @ApiProperty()
  @Expose()
  meanConfidence!: number;

  @ApiProperty()
  @Expose()
  languageModelCalls!: number;
}

export class ExtractionResponseDto {
  @ApiProperty({ type: [VavRecordResponseDto] })
  @Expose()
  @Type(() => VavRecordResponseDto)
  records!: VavRecordResponseDto[];

  @ApiProperty({ type: [DiagnosticResponseDto] })
  @Expose()
  @Type(() => DiagnosticResponseDto)
  diagnostics!: DiagnosticResponseDto[];

  @ApiProperty({ type: ExtractionSummaryResponseDto })
  @Expose()
  @Type(() => ExtractionSummaryResponseDto)
  summary!: ExtractionSummaryResponseDto;

  @ApiProperty({ description: 'True when the client cancelled and results are partial' })
  @Expose()
  cancelled!: boolean;
}
