import { createHash, timingSafeEqual } from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import { PASSWORD_HEADER } from '../src/api/schemas';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Compare against the shared password in constant time. Still a single
 * static secret: a gate, not real authentication.
 */
export function passwordMatches(expected: string | null, given: string | undefined): boolean {
  if (expected === null) return true;
  if (given === undefined) return false;
  return timingSafeEqual(digest(expected), digest(given));
}

export function requireAccess(accessPassword: string | null) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (passwordMatches(accessPassword, req.get(PASSWORD_HEADER))) {
      next();
      return;
    }
    res.status(401).json({ message: 'Incorrect password. Please log in again.' });
  };
}
