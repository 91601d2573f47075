import { IsEnum, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { CreateGuestRequest, RsvpStatus, UpdateGuestRequest } from '@event-hub/shared';
import { Trim } from '@/common/transforms/trim.transform';

export class CreateGuestDto implements CreateGuestRequest {
  @ApiProperty({ example: 'Jane Doe' })
  @Trim()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name!: string;

  @ApiPropertyOptional({ description: 'Email address or phone number' })
  @IsOptional()
  @Trim()
  @IsString()
  @MaxLength(255)
  contact?: string;

  @ApiPropertyOptional({ enum: RsvpStatus, default: RsvpStatus.PENDING })
  @IsOptional()
  @IsEnum(RsvpStatus)
  rsvpStatus?: RsvpStatus;
}

export class UpdateGuestDto implements UpdateGuestRequest {
  @ApiPropertyOptional()
  @IsOptional()
  @Trim()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @Trim()
  @IsString()
  @MaxLength(255)
  contact?: string;

  @ApiPropertyOptional({ enum: RsvpStatus })
  @IsOptional()
  @IsEnum(RsvpStatus)
  rsvpStatus?: RsvpStatus;
}
