// =============================================================================
// BASTION — Principal & Token Types
// =============================================================================

import { z } from 'zod';
import { Role } from './roles';

/**
 * An authenticated actor for the lifetime of one request.
 * Built from the bearer token; never mutated afterwards.
 */
export interface Principal {
  readonly id: string;
  readonly role: Role;
  readonly displayName: string;
}

/**
 * JWT payload as issued by /api/auth/login. The role travels as a raw
 * string and is parsed (with least-privilege fallback) on every request.
 */
export const tokenPayloadSchema = z.object({
  sub: z.string().min(1),
  role: z.string().optional(),
  name: z.string().optional(),
  iat: z.number().optional(),
  exp: z.number().optional(),
});
