import { ValueTransformer } from 'typeorm';

/**
 * Postgres returns `decimal` columns as strings; entities expose numbers.
 */
export const decimalTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | null) => (value === null ? null : Number.parseFloat(value)),
};

export const roundMoney = (value: number): number => Math.round(value * 100) / 100;
