import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Put,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CurrentUser } from '@/common/decorators/current-user.decorator';
import { RequirePermission } from '@/common/decorators/permission.decorator';
import { PermissionsGuard } from '@/modules/authorization/guards/permissions.guard';
import { Principal } from '@/modules/authorization/principal';
import { JwtAuthGuard } from '@/modules/identity/guards/jwt-auth.guard';
import { CatalogService } from '../services/catalog.service';
import { CatalogItem } from '../entities/catalog-item.entity';
import { CreateItemDto, UpdateItemDto } from '../dto/catalog.dto';

@ApiTags('vendor')
@Controller('vendor/items')
@UseGuards(JwtAuthGuard, PermissionsGuard)
@ApiBearerAuth()
export class VendorItemsController {
  constructor(private readonly catalogService: CatalogService) {}

  @Get()
  @RequirePermission('catalog_item', 'list')
  @ApiOperation({ summary: 'List own items, any approval status' })
  async list(@CurrentUser() principal: Principal): Promise<CatalogItem[]> {
    return this.catalogService.listOwn(principal);
  }

  @Post()
  @RequirePermission('catalog_item', 'create')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create an item', description: 'New items await admin review' })
  async create(
    @CurrentUser() principal: Principal,
    @Body() dto: CreateItemDto,
  ): Promise<CatalogItem> {
    return this.catalogService.createOwn(principal, dto);
  }

  @Put(':id')
  @RequirePermission('catalog_item', 'update')
  @ApiOperation({ summary: 'Edit an item', description: 'Sends the item back to review' })
  @ApiParam({ name: 'id', description: 'Item ID' })
  @ApiResponse({ status: 404, description: 'Unknown item or owned by another vendor' })
  async update(
    @CurrentUser() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateItemDto,
  ): Promise<CatalogItem> {
    return this.catalogService.updateOwn(principal, id, dto);
  }

  @Delete(':id')
  @RequirePermission('catalog_item', 'delete')
  @ApiOperation({ summary: 'Delete an item' })
  @ApiParam({ name: 'id', description: 'Item ID' })
  async remove(
    @CurrentUser() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<{ id: string; deleted: boolean }> {
    await this.catalogService.removeOwn(principal, id);
    return { id, deleted: true };
  }
}
