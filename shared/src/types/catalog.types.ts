/**
 * Catalog Approval States
 *
 * pending → approved → (vendor edit) → pending
 *    ↓          ↓
 * rejected ←────┘
 *    ↓
 * (vendor edit) → pending
 */
export enum ApprovalStatus {
  /** Awaiting admin review, not visible to users */
  PENDING = 'pending',
  /** Visible in the marketplace (if the vendor is active) */
  APPROVED = 'approved',
  /** Turned down by an admin */
  REJECTED = 'rejected',
}

/** Transitions admins may apply; vendor edits always reset to PENDING */
export const APPROVAL_TRANSITIONS: Record<ApprovalStatus, ApprovalStatus[]> = {
  [ApprovalStatus.PENDING]: [ApprovalStatus.APPROVED, ApprovalStatus.REJECTED],
  [ApprovalStatus.APPROVED]: [ApprovalStatus.REJECTED],
  [ApprovalStatus.REJECTED]: [ApprovalStatus.APPROVED],
};

export enum ItemCategory {
  CATERING = 'Catering',
  FLORIST = 'Florist',
  DECORATION = 'Decoration',
  LIGHTING = 'Lighting',
  VENUE = 'Venue',
  ENTERTAINMENT = 'Entertainment',
  PHOTOGRAPHY = 'Photography',
  OTHER = 'Other',
}
