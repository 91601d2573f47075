import { SetMetadata } from '@nestjs/common';
import type { Action, ResourceType, Scope } from '@/modules/authorization/access-policy';

export const PERMISSION_KEY = 'permission';

export interface RequiredPermission {
  resource: ResourceType;
  action: Action;
  /** Scope the grant must have; `any` marks handlers that ignore ownership */
  scope?: Scope;
}

/**
 * Declares the capability a handler needs; checked once by PermissionsGuard
 *
 * @example
 * @RequirePermission('catalog_item', 'approve')
 * @UseGuards(JwtAuthGuard, PermissionsGuard)
 * async approve() { ... }
 *
 * @example
 * // Admin route over every vendor's items; an `own` grant is refused
 * @RequirePermission('catalog_item', 'delete', 'any')
 */
export const RequirePermission = (resource: ResourceType, action: Action, scope?: Scope) =>
  SetMetadata(PERMISSION_KEY, { resource, action, scope } satisfies RequiredPermission);
