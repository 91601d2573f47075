import { MembershipStatus, UserRole } from '@event-hub/shared';

/**
 * The live identity behind a verified token.
 *
 * Built from the database on every request, so role and status changes
 * take effect without waiting for the token to expire.
 */
export interface Principal {
  id: string;
  email: string;
  name: string;
  role: UserRole;
  /** Vendor profile owned by this identity (vendor role only) */
  vendorId: string | null;
  membershipStatus: MembershipStatus | null;
}

declare global {
  namespace Express {
    // Passport attaches the principal as `request.user`
    interface User extends Principal {}
  }
}
