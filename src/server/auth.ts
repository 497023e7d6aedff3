import jwt from 'jsonwebtoken';
import type { Request, Response, NextFunction } from 'express';

const ISSUER = 'steward-engine';

export function verifyInternalToken(secret: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Missing authorization header' });
      return;
    }

    const token = header.slice(7);
    try {
      jwt.verify(token, secret, { issuer: ISSUER });
      next();
    } catch {
      res.status(401).json({ error: 'Invalid token' });
    }
  };
}

/** `expiresInSeconds` defaults to one day. */
export function generateInternalToken(secret: string, expiresInSeconds = 24 * 60 * 60): string {
  return jwt.sign({ iat: Math.floor(Date.now() / 1000) }, secret, {
    issuer: ISSUER,
    expiresIn: expiresInSeconds,
  });
}
