/**
 * Identity Model
 *
 * Every account is a single User with one platform role. Vendor accounts own
 * exactly one VendorProfile, whose membership status is controlled by admins.
 *
 * User (global identity)
 *   └── VendorProfile (vendor role only)
 *         └── CatalogItem[]
 */

export enum UserRole {
  /** Platform administrator */
  ADMIN = 'admin',
  /** Supplier of products/services */
  VENDOR = 'vendor',
  /** Event organiser browsing the marketplace */
  USER = 'user',
}

/** Account status; disabled accounts cannot authenticate */
export enum UserStatus {
  ACTIVE = 'active',
  DISABLED = 'disabled',
}

/** Vendor visibility gate, independent of item approval */
export enum MembershipStatus {
  PENDING = 'pending',
  ACTIVE = 'active',
  INACTIVE = 'inactive',
}

/** Roles that may be chosen at self-registration */
export const SELF_REGISTRATION_ROLES = [UserRole.USER, UserRole.VENDOR] as const;
