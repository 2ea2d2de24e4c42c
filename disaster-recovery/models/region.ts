// DR Region and Table Identifiers

import { z } from 'zod';
import { InvalidRegionError } from '../errors';

// us-east-1, eu-west-2, us-gov-west-1, ap-southeast-3 ...
const REGION_PATTERN = /^[a-z]{2}(?:-[a-z]+)+-\d+$/;

export const RegionSchema = z
  .string()
  .min(6)
  .regex(REGION_PATTERN, 'Region must look like <area>-<location>-<number>')
  .brand<'Region'>();

export type Region = z.infer<typeof RegionSchema>;

export const TableNameSchema = z
  .string()
  .min(3)
  .max(255)
  .regex(/^[A-Za-z0-9_.-]+$/, 'Table names may only contain letters, digits, "_", "-" and "."')
  .brand<'TableName'>();

export type TableName = z.infer<typeof TableNameSchema>;

export function isValidRegion(value: string): boolean {
  return RegionSchema.safeParse(value).success;
}

export function parseRegion(value: string): Region {
  const parsed = RegionSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidRegionError(value);
  }
  return parsed.data;
}

export function parseTableName(value: string): TableName {
  return TableNameSchema.parse(value);
}
