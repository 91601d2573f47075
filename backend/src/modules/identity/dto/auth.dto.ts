import {
  IsEmail,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  MinLength,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  LoginRequest,
  RegisterRequest,
  RegisterVendorRequest,
  SELF_REGISTRATION_ROLES,
  UserRole,
  UserStatus,
} from '@event-hub/shared';
import { NormalizeEmail, Trim } from '@/common/transforms/trim.transform';
import { User } from '../entities/user.entity';

export const PASSWORD_MIN_LENGTH = 6;

export class RegisterDto implements RegisterRequest {
  @ApiProperty({ example: 'Jane Doe' })
  @Trim()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name!: string;

  @ApiProperty({ example: 'jane@example.com' })
  @NormalizeEmail()
  @IsEmail()
  email!: string;

  @ApiProperty({ minLength: PASSWORD_MIN_LENGTH })
  @IsString()
  @MinLength(PASSWORD_MIN_LENGTH)
  @MaxLength(100)
  password!: string;

  @ApiPropertyOptional({
    enum: [UserRole.USER, UserRole.VENDOR],
    default: UserRole.USER,
    description: 'Vendor accounts start with a pending vendor profile',
  })
  @IsOptional()
  @IsIn(SELF_REGISTRATION_ROLES)
  role?: UserRole.USER | UserRole.VENDOR;
}

export class RegisterVendorDto implements RegisterVendorRequest {
  @ApiProperty({ example: 'Jane Doe' })
  @Trim()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name!: string;

  @ApiProperty({ example: 'bloom@example.com' })
  @NormalizeEmail()
  @IsEmail()
  email!: string;

  @ApiProperty({ minLength: PASSWORD_MIN_LENGTH })
  @IsString()
  @MinLength(PASSWORD_MIN_LENGTH)
  @MaxLength(100)
  password!: string;

  @ApiProperty({ example: 'Bloom & Petal' })
  @Trim()
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  companyName!: string;
}

export class LoginDto implements LoginRequest {
  @ApiProperty({ example: 'jane@example.com' })
  @NormalizeEmail()
  @IsEmail()
  email!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  password!: string;
}

export class UpdateMeDto {
  @ApiPropertyOptional()
  @IsOptional()
  @Trim()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name?: string;

  @ApiPropertyOptional({ description: 'Required when changing the password' })
  @IsOptional()
  @IsString()
  currentPassword?: string;

  @ApiPropertyOptional({ minLength: PASSWORD_MIN_LENGTH })
  @IsOptional()
  @IsString()
  @MinLength(PASSWORD_MIN_LENGTH)
  @MaxLength(100)
  newPassword?: string;
}

export class UserResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  name!: string;

  @ApiProperty()
  email!: string;

  @ApiProperty({ enum: UserRole })
  role!: UserRole;

  @ApiProperty({ enum: UserStatus })
  status!: UserStatus;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty()
  updatedAt!: Date;
}

export class AuthResponseDto {
  @ApiProperty()
  accessToken!: string;

  @ApiProperty({
    description: 'Access token expiration time (ISO 8601)',
  })
  expiresAt!: string;

  @ApiProperty()
  user!: UserResponseDto;
}

/** Public projection of an identity; the password hash never leaves the service */
export function toUserResponse(user: User): UserResponseDto {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    role: user.role,
    status: user.status,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}
