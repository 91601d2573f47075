import { UserRole } from '@event-hub/shared';

export type ResourceType =
  | 'identity'
  | 'vendor_profile'
  | 'catalog_item'
  | 'cart_entry'
  | 'order'
  | 'order_line'
  | 'guest';

export type Action =
  | 'list'
  | 'read'
  | 'browse'
  | 'create'
  | 'update'
  | 'delete'
  | 'approve'
  | 'reject'
  | 'pay'
  | 'cancel'
  | 'fulfill';

/**
 * `any` grants act on every record of the resource type;
 * `own` grants only on records owned by the caller.
 */
export type Scope = 'any' | 'own';

export interface Grant {
  actions: readonly Action[];
  scope: Scope;
}

export type AccessPolicy = Record<UserRole, Partial<Record<ResourceType, Grant>>>;

/**
 * Role × resource capability table. Anything not listed is denied.
 *
 * Ownership for `own` grants is keyed on the user id, except for vendor
 * resources which are keyed on the vendor profile id.
 */
export const ACCESS_POLICY: AccessPolicy = {
  [UserRole.ADMIN]: {
    identity: { actions: ['list', 'read', 'create', 'update', 'delete'], scope: 'any' },
    vendor_profile: { actions: ['list', 'read', 'update'], scope: 'any' },
    catalog_item: { actions: ['list', 'read', 'approve', 'reject', 'delete'], scope: 'any' },
  },
  [UserRole.VENDOR]: {
    vendor_profile: { actions: ['read', 'update'], scope: 'own' },
    catalog_item: { actions: ['list', 'create', 'read', 'update', 'delete'], scope: 'own' },
    order_line: { actions: ['list', 'fulfill'], scope: 'own' },
  },
  [UserRole.USER]: {
    catalog_item: { actions: ['browse'], scope: 'any' },
    vendor_profile: { actions: ['browse'], scope: 'any' },
    cart_entry: { actions: ['list', 'create', 'update', 'delete'], scope: 'own' },
    order: { actions: ['list', 'create', 'read', 'pay', 'cancel'], scope: 'own' },
    guest: { actions: ['list', 'create', 'read', 'update', 'delete'], scope: 'own' },
  },
};
