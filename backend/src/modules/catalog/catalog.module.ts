import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { IdentityModule } from '@/modules/identity/identity.module';
import { CatalogItem } from './entities/catalog-item.entity';
import { CatalogService } from './services/catalog.service';
import { VendorItemsController } from './controllers/vendor-items.controller';
import { AdminItemsController } from './controllers/admin-items.controller';
import { MarketplaceController } from './controllers/marketplace.controller';

@Module({
  imports: [TypeOrmModule.forFeature([CatalogItem]), IdentityModule],
  controllers: [VendorItemsController, AdminItemsController, MarketplaceController],
  providers: [CatalogService],
  exports: [CatalogService],
})
export class CatalogModule {}
