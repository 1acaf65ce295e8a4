import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import { IsEnum, IsInt, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { EnrollmentStatus } from '../enums/enrollment.enums';
import { Enrollment } from '../entities/enrollment.entity';

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

const toInt = (value: unknown): number | undefined => {
  const parsed = typeof value === 'number' ? value : parseInt(String(value), 10);
  return Number.isFinite(parsed) ? parsed : undefined;
};

/** Out-of-range page sizes are clamped rather than rejected. */
export const clampLimit = (limit: number | undefined): number =>
  Math.min(MAX_PAGE_SIZE, Math.max(1, limit ?? DEFAULT_PAGE_SIZE));

export const clampPage = (page: number | undefined): number => Math.max(1, page ?? 1);

export class EnrollmentListQueryDto {
  @ApiPropertyOptional({ enum: EnrollmentStatus })
  @IsOptional()
  @IsEnum(EnrollmentStatus)
  status?: EnrollmentStatus;

  @ApiPropertyOptional({ default: 1 })
  @IsOptional()
  @Transform(({ value }) => toInt(value))
  @IsInt()
  page?: number;

  @ApiPropertyOptional({ default: DEFAULT_PAGE_SIZE, maximum: MAX_PAGE_SIZE })
  @IsOptional()
  @Transform(({ value }) => toInt(value))
  @IsInt()
  limit?: number;
}

export class PaginationDto {
  @ApiProperty()
  currentPage: number;

  @ApiProperty()
  totalPages: number;

  @ApiProperty()
  totalItems: number;

  @ApiProperty()
  perPage: number;

  @ApiProperty()
  hasNext: boolean;

  @ApiProperty()
  hasPrev: boolean;
}

export class EnrollmentListResponseDto {
  @ApiProperty({ type: [Enrollment] })
  data: Enrollment[];

  @ApiProperty({ type: PaginationDto })
  @Type(() => PaginationDto)
  pagination: PaginationDto;
}

export class CourseAccessQueryDto {
  @ApiProperty({ example: 'user-1' })
  @IsString()
  @IsNotEmpty()
  userId: string;
}
