import { z } from 'zod';

/** Unsigned integer amount carried as a decimal string (NUMERIC(78,0) range). */
export const uintAmountSchema = z
  .string()
  .regex(/^\d{1,78}$/, 'Expected an unsigned integer amount')
  .transform((value) => BigInt(value));

export const heightSchema = z.coerce
  .number()
  .int()
  .nonnegative()
  .max(Number.MAX_SAFE_INTEGER);

export const recordIdSchema = heightSchema;

export const amountJsonSchema = { type: 'string', pattern: '^[0-9]{1,78}$' } as const;

export const policyIdParamsJsonSchema = {
  type: 'object',
  required: ['policyId'],
  properties: {
    policyId: { type: 'integer', minimum: 0 }
  }
} as const;

export const claimIdParamsJsonSchema = {
  type: 'object',
  required: ['claimId'],
  properties: {
    claimId: { type: 'integer', minimum: 0 }
  }
} as const;

export const callerHeaderJsonSchema = {
  type: 'object',
  properties: {
    'x-wallet-address': { type: 'string' }
  }
} as const;
