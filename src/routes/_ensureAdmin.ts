import jwt from 'jsonwebtoken';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

export function ensureAdmin(secret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!secret) throw new Error('no_admin_secret');
      const h = req.headers.authorization || '';
      const t = h.startsWith('Bearer ') ? h.slice(7) : '';
      const d = jwt.verify(t, secret);
      if (typeof d === 'string' || d.role !== 'admin') throw new Error('not_admin');
      res.locals.admin_id = d.admin_id ?? null;
      next();
    } catch (e) {
      console.warn('[admin] rejected:', e instanceof Error ? e.message : e);
      return res.status(401).json({ error: 'unauthorized_admin' });
    }
  };
}
