import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerModule } from '@nestjs/throttler';
import { DatabaseModule } from './common/database/database.module';
import { HealthController } from './common/health/health.controller';
import { AuthorizationModule } from './modules/authorization/authorization.module';
import { IdentityModule } from './modules/identity/identity.module';
import { CatalogModule } from './modules/catalog/catalog.module';
import { CartModule } from './modules/cart/cart.module';
import { OrdersModule } from './modules/orders/orders.module';
import { GuestsModule } from './modules/guests/guests.module';
import { databaseConfig } from './config/database.config';
import { authConfig } from './config/auth.config';
import { httpConfig } from './config/http.config';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      load: [databaseConfig, authConfig, httpConfig],
      envFilePath: ['.env.local', '.env'],
    }),

    // Rate limiting, applied to the credential endpoints
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => [
        {
          name: 'default',
          ttl: configService.get<number>('http.throttle.ttlMs', 60000),
          limit: configService.get<number>('http.throttle.limit', 20),
        },
      ],
    }),

    // Infrastructure
    DatabaseModule,
    AuthorizationModule,

    // Feature modules
    IdentityModule,
    CatalogModule,
    CartModule,
    OrdersModule,
    GuestsModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
