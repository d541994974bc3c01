import type { NextFunction, Response } from 'express';
import { ForbiddenError, UnauthorizedError } from '../utils/AppError';
import { sendResponse } from '../utils/response';
import type { AuthRequest, AuthUser } from './auth';

export type Actor = Pick<AuthUser, 'id' | 'isStaff'>;

const SAFE_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);

// Reads for any authenticated user, writes for staff only.
export const isStaffOrReadOnly = (req: AuthRequest, res: Response, next: NextFunction) => {
  if (!req.user) {
    return sendResponse(res, 401, 'Authentication required');
  }
  if (!SAFE_METHODS.has(req.method) && !req.user.isStaff) {
    return sendResponse(res, 403, 'Access denied. Insufficient permissions');
  }
  next();
};

export const isStaff = (req: AuthRequest, res: Response, next: NextFunction) => {
  if (!req.user) {
    return sendResponse(res, 401, 'Authentication required');
  }
  if (!req.user.isStaff) {
    return sendResponse(res, 403, 'Access denied. Insufficient permissions');
  }
  next();
};

export function requireUser(req: AuthRequest): AuthUser {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
}

/** Staff may modify anything; other users only records they created. */
export function assertOwnerOrStaff(actor: Actor, createdBy: string) {
  if (!actor.isStaff && actor.id !== createdBy) {
    throw new ForbiddenError('Only staff or the creator can modify this record');
  }
}
