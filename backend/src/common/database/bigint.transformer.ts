import { ValueTransformer } from 'typeorm';

/**
 * Maps a `bigint` column to a JS number. The pg driver returns int8 as a
 * string; cent amounts stay far below Number.MAX_SAFE_INTEGER.
 */
export const bigintToNumber: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) => (value === null ? null : Number(value)),
};
