import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { Request, Response, NextFunction } from 'express';

export interface AccountPrincipal {
  accountId: string;
  admin: boolean;
}

const claimsSchema = z.object({
  sub: z.string().min(1),
  admin: z.boolean().optional(),
});

export function verifyAccountToken(secret: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      res.status(401).json({ error: 'UNAUTHORIZED', message: 'Missing authorization header' });
      return;
    }

    const token = header.slice(7);
    try {
      const claims = claimsSchema.parse(jwt.verify(token, secret, { algorithms: ['HS256'] }));
      res.locals.principal = { accountId: claims.sub, admin: claims.admin === true } satisfies AccountPrincipal;
      next();
    } catch {
      res.status(401).json({ error: 'UNAUTHORIZED', message: 'Invalid token' });
    }
  };
}

export function requireAdmin() {
  return (_req: Request, res: Response, next: NextFunction): void => {
    if (!principalOf(res).admin) {
      res.status(403).json({ error: 'FORBIDDEN', message: 'Admin access required' });
      return;
    }
    next();
  };
}

const principalSchema = z.object({ accountId: z.string(), admin: z.boolean() });

export function principalOf(res: Response): AccountPrincipal {
  return principalSchema.parse(res.locals.principal);
}

export function signAccountToken(
  secret: string,
  accountId: string,
  opts: { admin?: boolean; expiresIn?: number } = {},
): string {
  return jwt.sign({ sub: accountId, admin: opts.admin === true }, secret, {
    algorithm: 'HS256',
    expiresIn: opts.expiresIn ?? 24 * 60 * 60,
  });
}
