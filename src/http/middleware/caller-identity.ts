import type { FastifyRequest } from 'fastify';
import { getAddress, isAddress } from 'ethers';
import { z } from 'zod';

import { unauthorized } from '../../core/errors.js';
import type { Identity } from '../../domain/types.js';

export const CALLER_HEADER = 'x-wallet-address';

export const walletAddressSchema = z
  .string()
  .trim()
  .refine((value) => isAddress(value), { message: 'Expected a 20-byte hex wallet address' })
  .transform((value) => getAddress(value));

/**
 * Resolves the calling party from the wallet header.
 * Addresses are checksummed so that differently-cased spellings compare equal.
 */
export function requireCaller(request: FastifyRequest): Identity {
  const header = request.headers[CALLER_HEADER];
  if (typeof header !== 'string' || header.length === 0) {
    throw unauthorized('CALLER_REQUIRED', `The ${CALLER_HEADER} header is required.`);
  }

  const parsed = walletAddressSchema.safeParse(header);
  if (!parsed.success) {
    throw unauthorized('CALLER_INVALID', `The ${CALLER_HEADER} header is not a valid wallet address.`);
  }
  return parsed.data;
}
