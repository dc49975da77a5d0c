import { Transform, Type } from 'class-transformer';
import { IsBoolean, IsInt, IsOptional, Max, Min } from 'class-validator';
import { toBoolean } from '../../common/transforms/query.transforms';

export class ListNotificationsQueryDto {
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  unread_only?: boolean;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(200)
  limit?: number;
}
