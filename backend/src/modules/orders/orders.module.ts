import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Order } from './entities/order.entity';
import { OrderLine } from './entities/order-line.entity';
import { OrderStatusHistory } from './entities/order-status-history.entity';
import { OrderStateMachine } from './services/order-state-machine.service';
import { OrdersService } from './services/orders.service';
import { OrdersController } from './controllers/orders.controller';
import { VendorRequestsController } from './controllers/vendor-requests.controller';

@Module({
  imports: [TypeOrmModule.forFeature([Order, OrderLine, OrderStatusHistory])],
  controllers: [OrdersController, VendorRequestsController],
  providers: [OrdersService, OrderStateMachine],
  exports: [OrdersService],
})
export class OrdersModule {}
