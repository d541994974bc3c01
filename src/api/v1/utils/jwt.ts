import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { JWT_EXPIRES_IN, JWT_SECRET } from '../config/env';

const payloadSchema = z.object({
  id: z.string().min(1),
  username: z.string(),
  email: z.string(),
  isStaff: z.boolean(),
});

export type JWTPayload = z.infer<typeof payloadSchema>;

export const generateToken = (payload: JWTPayload): string => {
  return jwt.sign(payload, JWT_SECRET, { expiresIn: JWT_EXPIRES_IN });
};

export const verifyToken = (token: string): JWTPayload => {
  const decoded = jwt.verify(token, JWT_SECRET);
  const { id, username, email, isStaff } = payloadSchema.parse(decoded);
  return { id, username, email, isStaff };
};
