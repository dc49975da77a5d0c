import { Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsDateString,
  IsEnum,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import {
  ComplaintPriority,
  ComplaintStatus,
} from '../../common/enums/complaint.enum';
import { toBoolean, trim } from '../../common/transforms/query.transforms';

export class CreateComplaintsDto {
  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  title!: string;

  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  description!: string;

  @Type(() => Number)
  @IsInt()
  category_id!: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  subcategory_id?: number;

  @IsOptional()
  @IsEnum(ComplaintPriority)
  priority?: ComplaintPriority;

  @IsOptional()
  @IsString()
  remarks?: string;
}

export class AssignComplaintDto {
  @Type(() => Number)
  @IsInt()
  assigned_to!: number;

  @IsOptional()
  @IsString()
  remarks?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  expected_version?: number;
}

export class UpdateComplaintStatusDto {
  @IsEnum(ComplaintStatus)
  status!: ComplaintStatus;

  @IsOptional()
  @IsString()
  remarks?: string;

  @IsOptional()
  @IsEnum(ComplaintStatus)
  expected_status?: ComplaintStatus;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  expected_version?: number;
}

export class ReopenComplaintDto {
  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  remarks!: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  expected_version?: number;
}

export class UpdateComplaintDetailsDto {
  @IsOptional()
  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  title?: string;

  @IsOptional()
  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  description?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  category_id?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  subcategory_id?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  expected_version?: number;
}

export class UpdateComplaintPriorityDto {
  @IsEnum(ComplaintPriority)
  priority!: ComplaintPriority;

  @IsOptional()
  @IsString()
  admin_remarks?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  expected_version?: number;
}

export const COMPLAINT_ORDERINGS = [
  'created_at',
  '-created_at',
  'updated_at',
  '-updated_at',
  'priority',
  '-priority',
] as const;
export type ComplaintOrdering = (typeof COMPLAINT_ORDERINGS)[number];

export class ListComplaintsQueryDto {
  @IsOptional()
  @IsEnum(ComplaintStatus)
  status?: ComplaintStatus;

  @IsOptional()
  @IsEnum(ComplaintPriority)
  priority?: ComplaintPriority;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  category?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  subcategory?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  assigned_to?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  created_by?: number;

  @IsOptional()
  @IsString()
  search?: string;

  @IsOptional()
  @IsIn(COMPLAINT_ORDERINGS)
  ordering?: ComplaintOrdering;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  limit?: number;
}

export const EXPORT_FORMATS = ['csv', 'json', 'pdf'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export class ExportComplaintsDto {
  @IsOptional()
  @IsIn(EXPORT_FORMATS)
  format?: ExportFormat;

  @IsOptional()
  @IsDateString()
  from_date?: string;

  @IsOptional()
  @IsDateString()
  to_date?: string;

  @IsOptional()
  @IsEnum(ComplaintStatus)
  status?: ComplaintStatus;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  category?: number;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  include_history?: boolean;
}

/** What the engine keeps about an uploaded file. */
export interface AttachmentRef {
  path: string;
  originalName: string;
  mimeType: string;
  size: number;
}
