import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { DiagnosticReason } from '../domain/enums/diagnostic-reason.enum';
import { ExtractionStage } from '../domain/enums/extraction-stage.enum';

export class DiagnosticResponseDto {
  @ApiProperty({ enum: ExtractionStage })
  @Expose()
  stage!: ExtractionStage;

  @ApiProperty({ enum: DiagnosticReason })
  @Expose()
  reason!: DiagnosticReason;

  @ApiProperty()
  @Expose()
  message!: string;

  @ApiPropertyOptional({ description: '1-based page number' })
  @Expose()
  page?: number;

  @ApiPropertyOptional({ description: 'Box id of the record the diagnostic refers to' })
  @Expose()
  boxId?: string;
}
