import { Controller, Get, Param, ParseUUIDPipe, Query, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { RequirePermission } from '@/common/decorators/permission.decorator';
import { PermissionsGuard } from '@/modules/authorization/guards/permissions.guard';
import { JwtAuthGuard } from '@/modules/identity/guards/jwt-auth.guard';
import { VendorsService } from '@/modules/identity/services/vendors.service';
import { PublicVendorDto } from '@/modules/identity/dto/vendor-response';
import { CatalogService } from '../services/catalog.service';
import { CatalogItem } from '../entities/catalog-item.entity';
import { BrowseItemsQueryDto } from '../dto/catalog.dto';

/**
 * User-facing marketplace: only active vendors and their approved items
 */
@ApiTags('user')
@Controller('user')
@UseGuards(JwtAuthGuard, PermissionsGuard)
@ApiBearerAuth()
export class MarketplaceController {
  constructor(
    private readonly catalogService: CatalogService,
    private readonly vendorsService: VendorsService,
  ) {}

  @Get('vendors')
  @RequirePermission('vendor_profile', 'browse')
  @ApiOperation({ summary: 'List active vendors' })
  async vendors(): Promise<PublicVendorDto[]> {
    const vendors = await this.vendorsService.listActive();
    return vendors.map((vendor) => ({ id: vendor.id, companyName: vendor.companyName }));
  }

  @Get('vendors/:id/items')
  @RequirePermission('catalog_item', 'browse')
  @ApiOperation({ summary: 'Approved items of one active vendor' })
  @ApiParam({ name: 'id', description: 'Vendor ID' })
  @ApiResponse({ status: 404, description: 'Unknown or inactive vendor' })
  async vendorItems(@Param('id', ParseUUIDPipe) id: string): Promise<CatalogItem[]> {
    return this.catalogService.browseVendor(id);
  }

  @Get('items')
  @RequirePermission('catalog_item', 'browse')
  @ApiOperation({ summary: 'Browse approved items of active vendors' })
  async items(@Query() query: BrowseItemsQueryDto): Promise<CatalogItem[]> {
    return this.catalogService.browse({ category: query.category });
  }
}
