import { ValueTransformer } from 'typeorm';

/**
 * pg отдаёт bigint строкой, а telegram id всегда помещается в number.
 */
export const bigintTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) =>
    value === null ? null : Number(value),
};
