import {
  Body,
  Controller,
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
import { OrdersService } from '../services/orders.service';
import { Order } from '../entities/order.entity';
import { OrderStatusHistory } from '../entities/order-status-history.entity';
import { CancelOrderDto } from '../dto/orders.dto';

@ApiTags('user')
@Controller('user/orders')
@UseGuards(JwtAuthGuard, PermissionsGuard)
@ApiBearerAuth()
export class OrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  @Get()
  @RequirePermission('order', 'list')
  @ApiOperation({ summary: 'List own orders, newest first' })
  async list(@CurrentUser() principal: Principal): Promise<Order[]> {
    return this.ordersService.list(principal);
  }

  @Post()
  @RequirePermission('order', 'create')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Place an order from the cart',
    description: 'Snapshots current prices and empties the cart',
  })
  @ApiResponse({ status: 400, description: 'Cart is empty' })
  @ApiResponse({ status: 409, description: 'An item is no longer available' })
  async create(@CurrentUser() principal: Principal): Promise<Order> {
    return this.ordersService.createFromCart(principal);
  }

  @Get(':id')
  @RequirePermission('order', 'read')
  @ApiOperation({ summary: 'Get an order' })
  @ApiParam({ name: 'id', description: 'Order ID' })
  async get(
    @CurrentUser() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<Order> {
    return this.ordersService.get(principal, id);
  }

  @Put(':id/pay')
  @RequirePermission('order', 'pay')
  @ApiOperation({ summary: 'Pay a pending order' })
  @ApiParam({ name: 'id', description: 'Order ID' })
  @ApiResponse({ status: 409, description: 'Order is not pending or not payable' })
  async pay(
    @CurrentUser() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<Order> {
    return this.ordersService.pay(principal, id);
  }

  @Put(':id/cancel')
  @RequirePermission('order', 'cancel')
  @ApiOperation({ summary: 'Cancel a pending or paid order' })
  @ApiParam({ name: 'id', description: 'Order ID' })
  @ApiResponse({ status: 409, description: 'Order is final or partly fulfilled' })
  async cancel(
    @CurrentUser() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: CancelOrderDto,
  ): Promise<Order> {
    return this.ordersService.cancel(principal, id, dto.reason);
  }

  @Get(':id/history')
  @RequirePermission('order', 'read')
  @ApiOperation({ summary: 'Status history of an order' })
  @ApiParam({ name: 'id', description: 'Order ID' })
  async history(
    @CurrentUser() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<OrderStatusHistory[]> {
    return this.ordersService.history(principal, id);
  }
}
