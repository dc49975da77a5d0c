import { PartialType, PickType } from '@nestjs/mapped-types';
import { Transform, Type } from 'class-transformer';
import {
  IsEmail,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  MaxLength,
  Min,
  MinLength,
} from 'class-validator';
import { UserRoleType } from '../../common/enums/user-role.enum';
import { trim } from '../../common/transforms/query.transforms';

const digitsOnly = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.replace(/\D/g, '') : value;

export const SELF_REGISTER_ROLES = [UserRoleType.STUDENT, UserRoleType.FACULTY] as const;
export type SelfRegisterRole = (typeof SELF_REGISTER_ROLES)[number];

export class RegisterUserDto {
  @Transform(trim)
  @IsString()
  @MinLength(3, { message: 'Name must be at least 3 characters long' })
  @MaxLength(150)
  name!: string;

  @Transform(({ value }: { value: unknown }) =>
    typeof value === 'string' ? value.trim().toLowerCase() : value,
  )
  @IsEmail()
  email!: string;

  @IsString()
  @MinLength(8, { message: 'Password must be at least 8 characters long' })
  @Matches(/(?=.*[A-Za-z])(?=.*\d)/, {
    message: 'Password must contain at least one letter and one number',
  })
  password!: string;

  @IsString()
  @IsNotEmpty()
  password_confirm!: string;

  @IsIn(SELF_REGISTER_ROLES)
  role!: SelfRegisterRole;

  @Transform(digitsOnly)
  @IsString()
  @Matches(/^\d{10}$/, { message: 'Phone number must be exactly 10 digits' })
  phone!: string;

  @IsOptional()
  @Transform(trim)
  @IsString()
  @MaxLength(100)
  department?: string;

  @Type(() => Number)
  @IsInt()
  @Min(15, { message: 'Age must be at least 15' })
  @Max(120, { message: 'Age cannot exceed 120' })
  age!: number;
}

export class UpdateProfileDto extends PartialType(
  PickType(RegisterUserDto, ['name', 'phone', 'department'] as const),
) {}
