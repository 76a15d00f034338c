import type { Request, Response, NextFunction } from 'express';

export function makeBearerAuth(expectedToken: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    // If no token is configured, allow (useful for local dev).
    if (!expectedToken) return next();

    const header = req.header('authorization') || '';
    if (header !== `Bearer ${expectedToken}`) {
      return res.status(401).json({ error: 'unauthorized' });
    }
    return next();
  };
}
