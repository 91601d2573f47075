import { Body, Controller, Get, Put, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CurrentUser } from '@/common/decorators/current-user.decorator';
import { RequirePermission } from '@/common/decorators/permission.decorator';
import { PermissionsGuard } from '@/modules/authorization/guards/permissions.guard';
import { Principal } from '@/modules/authorization/principal';
import { JwtAuthGuard } from '../guards/jwt-auth.guard';
import { VendorsService } from '../services/vendors.service';
import { toVendorResponse, VendorResponseDto } from '../dto/vendor-response';
import { UpdateVendorProfileDto } from '../dto/vendors.dto';

@ApiTags('vendor')
@Controller('vendor/profile')
@UseGuards(JwtAuthGuard, PermissionsGuard)
@ApiBearerAuth()
export class VendorProfileController {
  constructor(private readonly vendorsService: VendorsService) {}

  @Get()
  @RequirePermission('vendor_profile', 'read')
  @ApiOperation({ summary: 'Get own vendor profile and membership' })
  async get(@CurrentUser() principal: Principal): Promise<VendorResponseDto> {
    return toVendorResponse(await this.vendorsService.getOwnProfile(principal));
  }

  @Put()
  @RequirePermission('vendor_profile', 'update')
  @ApiOperation({ summary: 'Update company name' })
  async update(
    @CurrentUser() principal: Principal,
    @Body() dto: UpdateVendorProfileDto,
  ): Promise<VendorResponseDto> {
    return toVendorResponse(await this.vendorsService.updateOwnProfile(principal, dto));
  }
}
