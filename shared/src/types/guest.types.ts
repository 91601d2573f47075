export enum RsvpStatus {
  PENDING = 'pending',
  CONFIRMED = 'confirmed',
  DECLINED = 'declined',
}

export type GuestSummary = Record<RsvpStatus, number> & { total: number };
