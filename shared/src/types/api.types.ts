/**
 * API Request/Response Types
 *
 * Request bodies accepted by the API; the backend DTOs implement them.
 */

import type { UserRole } from './identity.types.js';
import type { ItemCategory } from './catalog.types.js';
import type { RsvpStatus } from './guest.types.js';

/** Machine-readable reasons carried by every error response */
export enum ErrorCode {
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  NOT_FOUND = 'NOT_FOUND',
  INVALID_TRANSITION = 'INVALID_TRANSITION',
  EMPTY_CART = 'EMPTY_CART',
  ITEM_UNAVAILABLE = 'ITEM_UNAVAILABLE',
  EMAIL_TAKEN = 'EMAIL_TAKEN',
  TOO_MANY_REQUESTS = 'TOO_MANY_REQUESTS',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/** API error structure */
export interface ApiError {
  statusCode: number;
  code: ErrorCode;
  message: string;
  path: string;
  timestamp: string;
  /** Individual validation messages */
  details?: string[];
}

// ==================== AUTH ====================

export interface LoginRequest {
  email: string;
  password: string;
}

export interface RegisterRequest {
  name: string;
  email: string;
  password: string;
  role?: UserRole.USER | UserRole.VENDOR;
}

export interface RegisterVendorRequest {
  name: string;
  email: string;
  password: string;
  companyName: string;
}

// ==================== CATALOG ====================

export interface CreateItemRequest {
  name: string;
  description?: string;
  priceCents: number;
  category: ItemCategory;
}

export type UpdateItemRequest = Partial<CreateItemRequest>;

export interface ReviewItemRequest {
  note?: string;
}

// ==================== CART ====================

export interface AddToCartRequest {
  itemId: string;
  quantity?: number;
}

export interface UpdateCartEntryRequest {
  quantity: number;
}

// ==================== GUESTS ====================

export interface CreateGuestRequest {
  name: string;
  contact?: string;
  rsvpStatus?: RsvpStatus;
}

export type UpdateGuestRequest = Partial<CreateGuestRequest>;
