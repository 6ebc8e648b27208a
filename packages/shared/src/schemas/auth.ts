import { z } from 'zod';

export const usernameSchema = z
  .string()
  .min(3, 'Username must be at least 3 characters');

export const passwordSchema = z
  .string()
  .min(8, 'Password must be at least 8 characters');

export const loginSchema = z.object({
  username: z.string().min(1, 'Username and password are required').pipe(usernameSchema),
  password: z.string().min(1, 'Username and password are required').pipe(passwordSchema),
});

export const registerSchema = z
  .object({
    username: z.string().min(1, 'All fields are required').pipe(usernameSchema),
    password: z.string().min(1, 'All fields are required').pipe(passwordSchema),
    confirmPassword: z.string().min(1, 'All fields are required'),
  })
  .refine((data) => data.password === data.confirmPassword, {
    message: 'Passwords do not match',
    path: ['confirmPassword'],
  });

export const userProfileSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String),
    username: z.string(),
  })
  .passthrough();

export const loginResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
  user: userProfileSchema,
});

export const registerResponseSchema = z.object({
  user: userProfileSchema,
  message: z.string().optional(),
});

// The server answers `{ error: { message, code } }`; other services use a flat shape.
export const apiErrorBodySchema = z.object({
  message: z.string().optional(),
  error: z
    .union([
      z.string(),
      z.object({
        message: z.string().optional(),
        code: z.union([z.string(), z.number()]).optional(),
      }),
    ])
    .optional(),
});

export const tokenClaimsSchema = z.record(z.string(), z.unknown());

// Export types inferred from schemas
export type LoginInput = z.infer<typeof loginSchema>;
export type RegisterInput = z.infer<typeof registerSchema>;
export type UserProfile = z.infer<typeof userProfileSchema>;
export type LoginResponse = z.infer<typeof loginResponseSchema>;
export type RegisterResponse = z.infer<typeof registerResponseSchema>;
export type ApiErrorBody = z.infer<typeof apiErrorBodySchema>;
export type TokenClaims = z.infer<typeof tokenClaimsSchema>;
