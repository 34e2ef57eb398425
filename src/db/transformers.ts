import { ValueTransformer } from "typeorm";

/**
 * pg returns BIGINT columns as strings; the service works with numbers.
 * External ids and byte sizes stay well below 2^53.
 */
export const bigintTransformer: ValueTransformer = {
    to: (value: number | null | undefined) => value,
    from: (value: string | number | null) => (value === null ? null : Number(value))
};
