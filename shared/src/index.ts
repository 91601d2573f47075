export * from './types/identity.types.js';
export * from './types/catalog.types.js';
export * from './types/order.types.js';
export * from './types/guest.types.js';
export * from './types/api.types.js';
