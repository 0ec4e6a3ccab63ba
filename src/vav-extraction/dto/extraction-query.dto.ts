import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import { IsBoolean, IsNumber, IsOptional, Max, Min } from 'class-validator';

function toBoolean({ value }: { value: unknown }): unknown {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return value;
}

export class ExtractionQueryDto {
  @ApiPropertyOptional({
    default: true,
    description:
      'Allow the language model fallback for weak neighborhoods (only when enabled on the server)',
  })
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  useLanguageModel?: boolean;

  @ApiPropertyOptional({
    description: 'Estimate a round inlet size from CFM when none is found',
  })
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  estimateInletFromCfm?: boolean;

  @ApiPropertyOptional({
    minimum: 1,
    maximum: 2000,
    description: 'Neighborhood radius in PDF points',
  })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(1)
  @Max(2000)
  neighborhoodRadius?: number;
}
