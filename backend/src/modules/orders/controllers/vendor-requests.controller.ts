import { Controller, Get, Param, ParseUUIDPipe, Put, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CurrentUser } from '@/common/decorators/current-user.decorator';
import { RequirePermission } from '@/common/decorators/permission.decorator';
import { PermissionsGuard } from '@/modules/authorization/guards/permissions.guard';
import { Principal } from '@/modules/authorization/principal';
import { JwtAuthGuard } from '@/modules/identity/guards/jwt-auth.guard';
import { OrdersService } from '../services/orders.service';
import { VendorRequestView } from '../dto/orders.dto';

@ApiTags('vendor')
@Controller('vendor/requests')
@UseGuards(JwtAuthGuard, PermissionsGuard)
@ApiBearerAuth()
export class VendorRequestsController {
  constructor(private readonly ordersService: OrdersService) {}

  @Get()
  @RequirePermission('order_line', 'list')
  @ApiOperation({ summary: 'Orders containing own lines' })
  async list(@CurrentUser() principal: Principal): Promise<VendorRequestView[]> {
    return this.ordersService.listRequests(principal);
  }

  @Put(':orderId/fulfill')
  @RequirePermission('order_line', 'fulfill')
  @ApiOperation({
    summary: 'Fulfill own lines of a paid order',
    description: 'The order completes when every vendor has fulfilled its lines',
  })
  @ApiParam({ name: 'orderId', description: 'Order ID' })
  @ApiResponse({ status: 409, description: 'Order not paid or lines already fulfilled' })
  async fulfill(
    @CurrentUser() principal: Principal,
    @Param('orderId', ParseUUIDPipe) orderId: string,
  ): Promise<VendorRequestView> {
    return this.ordersService.fulfill(principal, orderId);
  }
}
