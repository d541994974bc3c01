import type { NextFunction, Response } from 'express';
import type { AuthRequest } from '../middleware/auth';

type AsyncRequestHandler = (
  req: AuthRequest,
  res: Response,
  next: NextFunction
) => Promise<void>;

// Forwards rejected handlers to the error middleware.
export const requestHandler = (fn: AsyncRequestHandler) => {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
};
