/**
 * Caller identity for a request.
 *
 * Authentication happens in front of this service; the authenticated user
 * name arrives in the x-fleet-user header.
 */

import type { Request } from 'express';
import { ADMIN_USERS } from '../config.js';

export const CALLER_HEADER = 'x-fleet-user';
export const ANONYMOUS_USER = 'anonymous';

export interface Caller {
  username: string;
  /** Admins control labels of every non-system owner. */
  isAdmin: boolean;
}

export function resolveCaller(username: string | undefined, admins: readonly string[] = ADMIN_USERS): Caller {
  const name = username?.trim() || ANONYMOUS_USER;
  return { username: name, isAdmin: admins.includes(name) };
}

export function getCaller(req: Request): Caller {
  const header = req.headers[CALLER_HEADER];
  return resolveCaller(Array.isArray(header) ? header[0] : header);
}
