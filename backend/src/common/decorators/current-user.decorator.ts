import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { Request } from 'express';
import type { Principal } from '@/modules/authorization/principal';

/**
 * Extracts the current authenticated principal from the request
 *
 * @example
 * @Get('me')
 * getProfile(@CurrentUser() user: Principal) {
 *   return user;
 * }
 *
 * @example
 * // Get specific field
 * @Get('my-id')
 * getMyId(@CurrentUser('id') userId: string) {
 *   return userId;
 * }
 */
export const CurrentUser = createParamDecorator(
  (data: keyof Principal | undefined, ctx: ExecutionContext) => {
    const request = ctx.switchToHttp().getRequest<Request>();
    const user = request.user;

    if (!user) {
      throw new UnauthorizedException('Not authenticated');
    }

    return data ? user[data] : user;
  },
);
