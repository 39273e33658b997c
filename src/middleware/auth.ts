import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../config';
import { AuthenticationError, AuthorizationError } from '../errors';
import type { Actor } from '../types';

export type AuthRequest = Request & { user?: Actor };

const tokenPayloadSchema = z.object({
  id: z.string().min(1),
  username: z.string().optional(),
  role: z.enum(['admin', 'employee']),
});

export function signToken(actor: Actor): string {
  return jwt.sign({ id: actor.id, username: actor.username, role: actor.role }, config.auth.jwtSecret, {
    expiresIn: config.auth.jwtExpiresInSeconds,
  });
}

export function authRequired(req: AuthRequest, res: Response, next: NextFunction) {
  const auth = req.headers.authorization;
  if (!auth || !auth.startsWith('Bearer ')) return next(new AuthenticationError('Missing token'));
  const token = auth.slice(7);
  let payload: unknown;
  try {
    payload = jwt.verify(token, config.auth.jwtSecret);
  } catch {
    return next(new AuthenticationError('Invalid token'));
  }
  const parsed = tokenPayloadSchema.safeParse(payload);
  if (!parsed.success) return next(new AuthenticationError('Invalid token'));
  req.user = parsed.data;
  next();
}

export function requireRole(role: Actor['role']) {
  return (req: AuthRequest, _res: Response, next: NextFunction) => {
    if (!req.user) return next(new AuthenticationError());
    if (req.user.role !== role && req.user.role !== 'admin') return next(new AuthorizationError());
    next();
  };
}

export function getActor(req: AuthRequest): Actor {
  if (!req.user) throw new AuthenticationError();
  return req.user;
}
