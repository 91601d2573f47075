import {
  Body,
  Controller,
  Delete,
  Get,
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
import { CartService } from '../services/cart.service';
import { AddToCartDto, CartView, UpdateCartEntryDto } from '../dto/cart.dto';

@ApiTags('user')
@Controller('user/cart')
@UseGuards(JwtAuthGuard, PermissionsGuard)
@ApiBearerAuth()
export class CartController {
  constructor(private readonly cartService: CartService) {}

  @Get()
  @RequirePermission('cart_entry', 'list')
  @ApiOperation({ summary: 'Get cart with current total' })
  async get(@CurrentUser() principal: Principal): Promise<CartView> {
    return this.cartService.list(principal);
  }

  @Post()
  @RequirePermission('cart_entry', 'create')
  @ApiOperation({ summary: 'Add an item', description: 'Merges with an existing entry' })
  @ApiResponse({ status: 404, description: 'Item not orderable' })
  async add(@CurrentUser() principal: Principal, @Body() dto: AddToCartDto): Promise<CartView> {
    return this.cartService.add(principal, dto.itemId, dto.quantity);
  }

  @Delete()
  @RequirePermission('cart_entry', 'delete')
  @ApiOperation({ summary: 'Empty the cart' })
  async clear(@CurrentUser() principal: Principal): Promise<CartView> {
    return this.cartService.clear(principal);
  }

  @Put(':entryId')
  @RequirePermission('cart_entry', 'update')
  @ApiOperation({ summary: 'Set entry quantity' })
  @ApiParam({ name: 'entryId', description: 'Cart entry ID' })
  async update(
    @CurrentUser() principal: Principal,
    @Param('entryId', ParseUUIDPipe) entryId: string,
    @Body() dto: UpdateCartEntryDto,
  ): Promise<CartView> {
    return this.cartService.updateQuantity(principal, entryId, dto.quantity);
  }

  @Delete(':entryId')
  @RequirePermission('cart_entry', 'delete')
  @ApiOperation({ summary: 'Remove an entry' })
  @ApiParam({ name: 'entryId', description: 'Cart entry ID' })
  async remove(
    @CurrentUser() principal: Principal,
    @Param('entryId', ParseUUIDPipe) entryId: string,
  ): Promise<CartView> {
    return this.cartService.remove(principal, entryId);
  }
}
