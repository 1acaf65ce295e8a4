import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { Enrollment } from '../entities/enrollment.entity';

const trim = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);

export class CreateEnrollmentDto {
  @ApiProperty({ description: 'Course to enroll in', example: 'course-101' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  @Transform(trim)
  courseId: string;

  @ApiProperty({ example: 'Nguyen Van An' })
  @IsString()
  @IsNotEmpty({ message: 'Full name is required' })
  @Transform(trim)
  fullName: string;

  @ApiProperty({ example: 'student@example.com' })
  @IsString()
  @IsNotEmpty({ message: 'Email is required' })
  @Transform(trim)
  email: string;

  @ApiPropertyOptional({ example: 'SAVE20' })
  @IsOptional()
  @IsString()
  @MaxLength(50)
  @Transform(trim)
  discountCode?: string;
}

export class EnrollmentCreatedDto {
  @ApiProperty({ type: Enrollment })
  enrollment: Enrollment;

  @ApiProperty()
  paymentRequired: boolean;

  @ApiPropertyOptional({ example: '/payment/process/6f1c2d9e-3b7a-4c2e-9d1f-0a8b7c6d5e4f' })
  paymentUrl?: string;

  @ApiProperty()
  accessImmediate: boolean;
}
