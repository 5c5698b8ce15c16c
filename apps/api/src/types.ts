import type { FastifyRequest } from 'fastify';
import type { JwtClaims, Role } from '@shootline/auth';

export interface AuthenticatedRequest extends FastifyRequest {
  claims: JwtClaims;
  requestId: string;
}

export interface UserSummary {
  id: string;
  username: string;
  full_name: string;
  role: Role;
}

/**
 * Read-only state computed once per request and handed to the operations that
 * render user names (calendar, workload, production board).
 */
export interface ViewContext {
  actor: JwtClaims;
  users: ReadonlyMap<string, UserSummary>;
}
