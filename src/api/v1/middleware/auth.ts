import type { NextFunction, Request, Response } from 'express';
import { verifyToken } from '../utils/jwt';
import { sendResponse } from '../utils/response';

export interface AuthUser {
  id: string;
  username: string;
  email: string;
  isStaff: boolean;
}

export interface AuthRequest extends Request {
  user?: AuthUser;
}

export function authMiddleware(req: AuthRequest, res: Response, next: NextFunction) {
  const authHeader = req.headers["authorization"];
  if (!authHeader || !authHeader.startsWith("Bearer ")) {
    return sendResponse(res, 401, "No token provided");
  }

  const token = authHeader.slice("Bearer ".length);

  try {
    req.user = verifyToken(token);
    next();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(`Rejected bearer token: ${reason}`);
    return sendResponse(res, 401, "Invalid or expired token");
  }
}
