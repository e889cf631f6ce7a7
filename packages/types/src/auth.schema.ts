import { z } from 'zod';

// Registration schema with email, password (8-100 chars), optional display name
export const RegisterSchema = z.object({
  email: z.string().trim().email('Invalid email address').max(255),
  password: z
    .string()
    .min(8, 'Password must be at least 8 characters')
    .max(100, 'Password must be at most 100 characters'),
  displayName: z.string().max(255).nullish(),
});

export type RegisterInput = z.infer<typeof RegisterSchema>;

// Login only checks presence; strength rules apply at registration
export const LoginSchema = z.object({
  email: z.string().trim().email('Invalid email address'),
  password: z.string().min(1, 'Password is required').max(100),
});

export type LoginInput = z.infer<typeof LoginSchema>;

export const OAuthProviderSchema = z.enum(['google', 'apple']);

export const GoogleCallbackQuerySchema = z.object({
  code: z.string().min(1),
  state: z.string().min(1),
});

// Apple posts the callback as a form (response_mode=form_post)
export const AppleCallbackFormSchema = z.object({
  code: z.string().min(1),
  state: z.string().min(1),
  user: z.string().optional(),
});

// User schema for API responses (without sensitive fields)
export const UserResponseSchema = z.object({
  id: z.string().uuid(),
  email: z.string().email(),
  displayName: z.string().nullable(),
  avatarUrl: z.string().nullable(),
  oauthProvider: OAuthProviderSchema.nullable(),
  isActive: z.boolean(),
  createdAt: z.string(),
});

export type UserResponse = z.infer<typeof UserResponseSchema>;

export const TokenResponseSchema = z.object({
  accessToken: z.string(),
  tokenType: z.literal('bearer'),
  expiresAt: z.string(),
  user: UserResponseSchema,
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

export const AuthorizationUrlResponseSchema = z.object({
  authorizationUrl: z.string().url(),
  state: z.string(),
});
