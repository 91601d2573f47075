import { Body, Controller, Get, Param, ParseUUIDPipe, Put, Query, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { RequirePermission } from '@/common/decorators/permission.decorator';
import { PermissionsGuard } from '@/modules/authorization/guards/permissions.guard';
import { JwtAuthGuard } from '../guards/jwt-auth.guard';
import { VendorsService } from '../services/vendors.service';
import { toVendorResponse, VendorResponseDto } from '../dto/vendor-response';
import { AdminUpdateVendorDto, ListVendorsQueryDto, MembershipUpdateDto } from '../dto/vendors.dto';

@ApiTags('admin')
@Controller('admin')
@UseGuards(JwtAuthGuard, PermissionsGuard)
@ApiBearerAuth()
export class AdminVendorsController {
  constructor(private readonly vendorsService: VendorsService) {}

  @Get('vendors')
  @RequirePermission('vendor_profile', 'list', 'any')
  @ApiOperation({ summary: 'List vendor profiles' })
  async list(@Query() query: ListVendorsQueryDto): Promise<VendorResponseDto[]> {
    const vendors = await this.vendorsService.list({ membershipStatus: query.membershipStatus });
    return vendors.map(toVendorResponse);
  }

  @Put('vendors/:id')
  @RequirePermission('vendor_profile', 'update', 'any')
  @ApiOperation({ summary: 'Update company name or membership' })
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: AdminUpdateVendorDto,
  ): Promise<VendorResponseDto> {
    return toVendorResponse(await this.vendorsService.update(id, dto));
  }

  @Put('memberships/:vendorId')
  @RequirePermission('vendor_profile', 'update', 'any')
  @ApiOperation({
    summary: 'Set vendor membership',
    description: 'Only ACTIVE vendors are visible in the marketplace',
  })
  async setMembership(
    @Param('vendorId', ParseUUIDPipe) vendorId: string,
    @Body() dto: MembershipUpdateDto,
  ): Promise<VendorResponseDto> {
    return toVendorResponse(await this.vendorsService.setMembership(vendorId, dto.membershipStatus));
  }
}
