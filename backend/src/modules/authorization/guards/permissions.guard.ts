import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { PERMISSION_KEY, RequiredPermission } from '@/common/decorators/permission.decorator';
import { AuthorizationService } from '../services/authorization.service';

/**
 * Permissions Guard
 *
 * Checks the role-level grant declared with @RequirePermission. Ownership of
 * the specific record is resolved afterwards by the service that loads it.
 *
 * Usage:
 * @RequirePermission('order', 'pay')
 * @UseGuards(JwtAuthGuard, PermissionsGuard)
 * async pay() { ... }
 */
@Injectable()
export class PermissionsGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly authorization: AuthorizationService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const required = this.reflector.getAllAndOverride<RequiredPermission | undefined>(
      PERMISSION_KEY,
      [context.getHandler(), context.getClass()],
    );

    if (!required) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const user = request.user;

    if (!user) {
      throw new UnauthorizedException('Not authenticated');
    }

    this.authorization.assertCan(user, required.resource, required.action, required.scope);
    return true;
  }
}
