import { z } from 'zod';

export const registerSchema = z.object({
    username: z.string().min(3).max(150),
    password: z.string().min(8),
    email: z.string().email(),
    fullName: z.string().optional(),
});

export const signInSchema = z.object({
    username: z.string().min(1),
    password: z.string().min(1),
});
