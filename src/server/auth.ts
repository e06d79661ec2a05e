import { timingSafeEqual } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';
import type { ApiTokenConfig } from '../shared/types.js';

// Augment Express Request to carry the resolved caller identity
declare global {
  namespace Express {
    interface Request {
      caller?: string | null;
    }
  }
}

function tokensMatch(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  // timingSafeEqual throws on length mismatch
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

export interface AuthMiddleware {
  authenticate: (req: Request, res: Response, next: NextFunction) => void;
  protect: (req: Request, res: Response, next: NextFunction) => void;
  resolveIdentity: (token: string) => string | null;
}

/**
 * Bearer-token authentication. Each configured token maps to one caller
 * identity; operator rights are decided later by the engine's access control.
 */
export function createAuth(tokens: ApiTokenConfig[]): AuthMiddleware {
  function resolveIdentity(token: string): string | null {
    let identity: string | null = null;
    // No early exit: every entry is compared
    for (const entry of tokens) {
      if (tokensMatch(token, entry.token) && identity === null) {
        identity = entry.identity;
      }
    }
    return identity;
  }

  // ── Middleware: load caller from Authorization header (non-blocking) ──
  function authenticate(req: Request, _res: Response, next: NextFunction): void {
    const header = req.headers.authorization;
    if (!header?.startsWith('Bearer ')) {
      req.caller = null;
      next();
      return;
    }
    req.caller = resolveIdentity(header.slice('Bearer '.length).trim());
    next();
  }

  // ── Middleware: reject requests without a known caller ──
  function protect(req: Request, res: Response, next: NextFunction): void {
    if (!req.caller) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }
    next();
  }

  return { authenticate, protect, resolveIdentity };
}
