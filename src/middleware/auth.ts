import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import * as z from 'zod';

export interface AuthRequest extends Request {
  organiserId?: number;
  username?: string;
}

const organiserClaimsSchema = z.object({
  organiserId: z.number().int(),
  username: z.string(),
});

export type OrganiserClaims = z.infer<typeof organiserClaimsSchema>;

export function signOrganiserToken(claims: OrganiserClaims, secret: string): string {
  return jwt.sign(claims, secret, { expiresIn: '7d' });
}

export function readOrganiserClaims(decoded: unknown): OrganiserClaims | null {
  const result = organiserClaimsSchema.safeParse(decoded);
  return result.success ? result.data : null;
}

export function bearerToken(req: Request): string | undefined {
  const authHeader = req.headers['authorization'];
  return authHeader?.split(' ')[1]; // Bearer TOKEN
}

export const authenticateToken = (secret: string) => (req: AuthRequest, res: Response, next: NextFunction) => {
  const token = bearerToken(req);

  if (!token) {
    return res.status(401).json({ error: 'Access token required' });
  }

  jwt.verify(token, secret, (err, decoded) => {
    const claims = err ? null : readOrganiserClaims(decoded);
    if (!claims) {
      return res.status(403).json({ error: 'Invalid or expired token' });
    }

    req.organiserId = claims.organiserId;
    req.username = claims.username;
    next();
  });
};
