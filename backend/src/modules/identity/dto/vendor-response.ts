import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { MembershipStatus } from '@event-hub/shared';
import { VendorProfile } from '../entities/vendor-profile.entity';
import { toUserResponse, UserResponseDto } from './auth.dto';

export class VendorResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  userId!: string;

  @ApiProperty()
  companyName!: string;

  @ApiProperty({ enum: MembershipStatus })
  membershipStatus!: MembershipStatus;

  @ApiProperty()
  createdAt!: Date;

  @ApiPropertyOptional()
  user?: UserResponseDto;
}

/** Vendor as shown to marketplace users */
export class PublicVendorDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  companyName!: string;
}

export function toVendorResponse(profile: VendorProfile): VendorResponseDto {
  return {
    id: profile.id,
    userId: profile.userId,
    companyName: profile.companyName,
    membershipStatus: profile.membershipStatus,
    createdAt: profile.createdAt,
    ...(profile.user ? { user: toUserResponse(profile.user) } : {}),
  };
}
