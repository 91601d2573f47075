import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { UserRole } from '@event-hub/shared';
import { UsersService } from './users.service';

/**
 * Creates the configured administrator on startup if it does not exist yet.
 * Nothing happens unless both ADMIN_EMAIL and ADMIN_PASSWORD are set.
 */
@Injectable()
export class AdminBootstrapService implements OnApplicationBootstrap {
  private readonly logger = new Logger(AdminBootstrapService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly usersService: UsersService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    const email = this.configService.get<string>('auth.bootstrapAdmin.email');
    const password = this.configService.get<string>('auth.bootstrapAdmin.password');
    const name = this.configService.get<string>('auth.bootstrapAdmin.name', 'Admin');

    if (!email || !password) {
      return;
    }

    const normalized = email.trim().toLowerCase();
    const existing = await this.usersService.findByEmailWithPassword(normalized);
    if (existing) {
      return;
    }

    await this.usersService.createIdentity({
      name,
      email: normalized,
      password,
      role: UserRole.ADMIN,
    });
    this.logger.log('Bootstrap administrator created');
  }
}
