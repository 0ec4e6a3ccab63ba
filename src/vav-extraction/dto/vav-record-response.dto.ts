import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';

export class VavRecordResponseDto {
  @ApiProperty({ example: 'VAV-12' })
  @Expose()
  boxId!: string;

  @ApiProperty({ example: 350, nullable: true, type: Number })
  @Expose()
  cfm!: number | null;

  @ApiProperty({ example: '10x8', nullable: true, type: String })
  @Expose()
  inletSize!: string | null;

  @ApiProperty({ example: 1, description: 'First page the box appears on (1-based)' })
  @Expose()
  page!: number;

  @ApiProperty({ example: [1, 3], type: [Number] })
  @Expose()
  pages!: number[];

  @ApiProperty({ example: 0.933, minimum: 0, maximum: 1 })
  @Expose()
  confidence!: number;
}
