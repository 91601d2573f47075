import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { resolveJwtSecret } from '@/config/auth.config';

import { User } from './entities/user.entity';
import { VendorProfile } from './entities/vendor-profile.entity';

import { AuthController } from './controllers/auth.controller';
import { AdminUsersController } from './controllers/admin-users.controller';
import { AdminVendorsController } from './controllers/admin-vendors.controller';
import { VendorProfileController } from './controllers/vendor-profile.controller';

import { AuthService } from './services/auth.service';
import { UsersService } from './services/users.service';
import { VendorsService } from './services/vendors.service';
import { PasswordService } from './services/password.service';
import { AdminBootstrapService } from './services/admin-bootstrap.service';

import { JwtStrategy } from './strategies/jwt.strategy';
import { JwtAuthGuard } from './guards/jwt-auth.guard';

@Module({
  imports: [
    TypeOrmModule.forFeature([User, VendorProfile]),
    PassportModule.register({ defaultStrategy: 'jwt' }),
    JwtModule.registerAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        secret: resolveJwtSecret(configService),
        signOptions: {
          expiresIn: configService.get<string>('auth.jwt.accessTokenExpiry', '24h'),
        },
      }),
      inject: [ConfigService],
    }),
  ],
  controllers: [
    AuthController,
    AdminUsersController,
    AdminVendorsController,
    VendorProfileController,
  ],
  providers: [
    AuthService,
    UsersService,
    VendorsService,
    PasswordService,
    AdminBootstrapService,
    JwtStrategy,
    JwtAuthGuard,
  ],
  exports: [AuthService, UsersService, VendorsService, JwtAuthGuard],
})
export class IdentityModule {}
