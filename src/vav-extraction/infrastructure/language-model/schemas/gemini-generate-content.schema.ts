import { Transform, Type } from 'class-transformer';
import {
  IsArray,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';

/**
 * Gemini generateContent response shapes, reduced to what the adapter reads.
 */
export class GeminiPartSchema {
  @IsOptional()
  @IsString()
  text?: string;
}

export class GeminiContentSchema {
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => GeminiPartSchema)
  parts?: GeminiPartSchema[];
}

export class GeminiCandidateSchema {
  @IsOptional()
  @ValidateNested()
  @Type(() => GeminiContentSchema)
  content?: GeminiContentSchema;

  @IsOptional()
  @IsString()
  finishReason?: string;
}

export class GeminiGenerateContentResponseSchema {
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => GeminiCandidateSchema)
  candidates?: GeminiCandidateSchema[];
}

/**
 * The JSON object the prompt asks the model to return.
 */
export class ModelFieldSetSchema {
  @IsOptional()
  @IsString()
  box_id?: string | null;

  // numbers and strings such as "1,200" are both accepted, normalized later
  @IsOptional()
  @Transform(({ value }) => (typeof value === 'number' ? String(value) : value))
  @IsString()
  cfm?: string | null;

  @IsOptional()
  @Transform(({ value }) => (typeof value === 'number' ? String(value) : value))
  @IsString()
  inlet_size?: string | null;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  certainty?: number;
}
