import type { Request, Response, NextFunction } from 'express';

export function requireAuth(req: Request, res: Response, next: NextFunction) {
  const token = process.env.AUTH_TOKEN;
  if (!token) return next(); // no token configured = open access

  if (req.headers.authorization === `Bearer ${token}`) return next();

  res.status(401).json({ ok: false, error: 'Unauthorized' });
}
