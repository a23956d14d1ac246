import { z } from 'zod';
import { DELIVERY_CHANNELS, DEVICE_PLATFORMS } from '@keyrelay/shared';

// -----------------------------------------------------------------------------
// Validation Schemas
// -----------------------------------------------------------------------------
// Object schemas strip unknown keys, so clients may send extra fields.

const id = z.string().min(1).max(256);

export const registerTokenSchema = z.object({
  token: z.string().min(1).max(512),
  device: z.enum(DEVICE_PLATFORMS),
  channel: z.enum(DELIVERY_CHANNELS).optional(),
  user_id: id.optional(),
});

export const linkTokenSchema = z.object({
  token: z.string().min(1),
  session_id: id,
});

export const unlinkTokenSchema = z.object({
  token: z.string().min(1),
  session_id: id.optional(),
});

export const tokenParamsSchema = z.object({ token: z.string().min(1) });
export const sessionParamsSchema = z.object({ sessionId: id });
export const requestParamsSchema = z.object({ requestId: id });

export const initiateSchema = z.object({
  requestId: id.optional(),
  senderId: id,
  recipientId: id,
  publicKey: z.string().min(1),
  encryptedUserData: z.string().min(1),
});

export const acceptSchema = z.object({
  requestId: id,
  recipientId: id,
  encryptedUserData: z.string().min(1),
});

export const rejectSchema = z.object({
  requestId: id,
  recipientId: id,
});

// Over the socket the connection's own session fills in sender/recipient
export const socketInitiateSchema = initiateSchema.omit({ senderId: true });
export const socketAcceptSchema = acceptSchema.omit({ recipientId: true });
export const socketRejectSchema = rejectSchema.omit({ recipientId: true });

export const socketQuerySchema = z.object({ session_id: id });

export const socketFrameSchema = z.object({
  type: z.string(),
  payload: z.unknown().optional(),
});
