import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { z } from 'zod';

export const RoleSchema = z.enum(['admin', 'contributor']);
export type Role = z.infer<typeof RoleSchema>;

export const JwtClaimsSchema = z.object({
  sub: z.string().min(1),
  user_id: z.string().uuid(),
  username: z.string().min(1),
  role: RoleSchema,
  capabilities: z.array(z.string())
});

export type JwtClaims = z.infer<typeof JwtClaimsSchema>;

export interface SignJwtInput {
  claims: JwtClaims;
  secret: string;
  expiresIn?: jwt.SignOptions['expiresIn'];
}

export const signJwt = ({ claims, secret, expiresIn = '8h' }: SignJwtInput): string => {
  return jwt.sign(claims, secret, { expiresIn });
};

export const verifyJwt = (token: string, secret: string): JwtClaims => {
  const decoded = jwt.verify(token, secret);
  return JwtClaimsSchema.parse(decoded);
};

export const parseBearerToken = (authHeader?: string): string | null => {
  if (!authHeader) {
    return null;
  }
  const [scheme, token] = authHeader.split(' ');
  if (scheme?.toLowerCase() !== 'bearer' || !token) {
    return null;
  }
  return token;
};

const BCRYPT_ROUNDS = 10;

export const hashPassword = (password: string): string => bcrypt.hashSync(password, BCRYPT_ROUNDS);

/** False for anything that is not a bcrypt hash. */
export const verifyPassword = (password: string, stored: string): boolean => bcrypt.compareSync(password, stored);
