import {
  ForbiddenException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { UserRole } from '@event-hub/shared';
import { ACCESS_POLICY, AccessPolicy, Action, Grant, ResourceType, Scope } from '../access-policy';
import { Principal } from '../principal';

/** A concrete record to authorize against */
export interface ResourceRef {
  type: ResourceType;
  /** Owner key of the stored record (user id, or vendor profile id) */
  ownerId?: string | null;
}

const RESOURCE_LABELS: Record<ResourceType, string> = {
  identity: 'User',
  vendor_profile: 'Vendor',
  catalog_item: 'Item',
  cart_entry: 'Cart item',
  order: 'Order',
  order_line: 'Order',
  guest: 'Guest',
};

/** Resources whose ownership is keyed on the vendor profile */
const VENDOR_OWNED: ReadonlySet<ResourceType> = new Set<ResourceType>([
  'vendor_profile',
  'catalog_item',
  'order_line',
]);

/**
 * Authorization Gate
 *
 * Evaluates (role, resource, action) against {@link ACCESS_POLICY} and, for
 * `own` grants, resolves ownership from the stored record. A record owned by
 * someone else is reported exactly like a missing one (404), so ids cannot be
 * guessed across tenants.
 */
@Injectable()
export class AuthorizationService {
  private readonly logger = new Logger(AuthorizationService.name);
  private readonly policy: AccessPolicy = ACCESS_POLICY;

  grantFor(role: UserRole, resource: ResourceType, action: Action): Grant | null {
    const grant = this.policy[role]?.[resource];
    return grant && grant.actions.includes(action) ? grant : null;
  }

  can(role: UserRole, resource: ResourceType, action: Action): boolean {
    return this.grantFor(role, resource, action) !== null;
  }

  /**
   * Role-level check, used by the guard before the handler runs.
   * With `scope: 'any'` an `own` grant is not enough: the handler acts on
   * records regardless of owner.
   */
  assertCan(principal: Principal, resource: ResourceType, action: Action, scope?: Scope): Grant {
    const grant = this.grantFor(principal.role, resource, action);
    if (!grant || (scope === 'any' && grant.scope !== 'any')) {
      this.logger.warn(`Denied ${principal.role} ${principal.id}: ${action} ${resource}`);
      throw new ForbiddenException(`Role ${principal.role} may not ${action} ${resource}`);
    }
    if (VENDOR_OWNED.has(resource) && grant.scope === 'own' && !principal.vendorId) {
      throw new ForbiddenException('Vendor profile required');
    }
    return grant;
  }

  /**
   * Full check against a stored record
   */
  authorize(principal: Principal, action: Action, resource: ResourceRef): void {
    const grant = this.assertCan(principal, resource.type, action);

    if (grant.scope === 'own' && resource.ownerId !== undefined) {
      if (resource.ownerId === null || resource.ownerId !== this.ownerKey(principal, resource.type)) {
        throw this.notFound(resource.type);
      }
    }
  }

  /**
   * Load a record and authorize the action on it in one step.
   * Missing and foreign records both surface as NotFoundException.
   */
  async resolve<T>(
    principal: Principal,
    action: Action,
    type: ResourceType,
    load: () => Promise<T | null>,
    ownerOf: (record: T) => string | null,
  ): Promise<T> {
    this.assertCan(principal, type, action);

    const record = await load();
    if (!record) {
      throw this.notFound(type);
    }

    this.authorize(principal, action, { type, ownerId: ownerOf(record) });
    return record;
  }

  /**
   * Key a principal owns records under, for the given resource type
   */
  ownerKey(principal: Principal, resource: ResourceType): string | null {
    return VENDOR_OWNED.has(resource) ? principal.vendorId : principal.id;
  }

  notFound(type: ResourceType): NotFoundException {
    return new NotFoundException(`${RESOURCE_LABELS[type]} not found`);
  }
}
