import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseUUIDPipe,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CurrentUser } from '@/common/decorators/current-user.decorator';
import { RequirePermission } from '@/common/decorators/permission.decorator';
import { PermissionsGuard } from '@/modules/authorization/guards/permissions.guard';
import { JwtAuthGuard } from '@/modules/identity/guards/jwt-auth.guard';
import { CatalogService } from '../services/catalog.service';
import { CatalogItem } from '../entities/catalog-item.entity';
import { ListItemsQueryDto, ReviewItemDto } from '../dto/catalog.dto';

@ApiTags('admin')
@Controller('admin/items')
@UseGuards(JwtAuthGuard, PermissionsGuard)
@ApiBearerAuth()
export class AdminItemsController {
  constructor(private readonly catalogService: CatalogService) {}

  @Get()
  @RequirePermission('catalog_item', 'list', 'any')
  @ApiOperation({ summary: 'List all items' })
  async list(@Query() query: ListItemsQueryDto): Promise<CatalogItem[]> {
    return this.catalogService.listAll({ approvalStatus: query.approvalStatus });
  }

  @Put(':id/approve')
  @RequirePermission('catalog_item', 'approve', 'any')
  @ApiOperation({ summary: 'Approve a pending or rejected item' })
  @ApiParam({ name: 'id', description: 'Item ID' })
  @ApiResponse({ status: 409, description: 'Item already approved' })
  async approve(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser('id') reviewerId: string,
  ): Promise<CatalogItem> {
    return this.catalogService.approve(id, reviewerId);
  }

  @Put(':id/reject')
  @RequirePermission('catalog_item', 'reject', 'any')
  @ApiOperation({ summary: 'Reject a pending or approved item' })
  @ApiParam({ name: 'id', description: 'Item ID' })
  @ApiResponse({ status: 409, description: 'Item already rejected' })
  async reject(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser('id') reviewerId: string,
    @Body() dto: ReviewItemDto,
  ): Promise<CatalogItem> {
    return this.catalogService.reject(id, reviewerId, dto.note);
  }

  @Delete(':id')
  @RequirePermission('catalog_item', 'delete', 'any')
  @ApiOperation({ summary: 'Delete any item', description: 'Order lines keep their snapshot' })
  @ApiParam({ name: 'id', description: 'Item ID' })
  async remove(@Param('id', ParseUUIDPipe) id: string): Promise<{ id: string; deleted: boolean }> {
    await this.catalogService.removeAny(id);
    return { id, deleted: true };
  }
}
