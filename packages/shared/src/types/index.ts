// =============================================================================
// keyrelay Shared Types
// =============================================================================

// -----------------------------------------------------------------------------
// Identity
// -----------------------------------------------------------------------------

/** Opaque peer/device identifier issued by the identity layer. */
export type SessionId = string;

/** Opaque connection identifier owned by the transport layer. */
export type ConnectionHandle = string;

// -----------------------------------------------------------------------------
// Key Exchange Types
// -----------------------------------------------------------------------------

export type KeyExchangeStatus = 'pending' | 'accepted' | 'rejected' | 'expired';

export type TerminalKeyExchangeStatus = Exclude<KeyExchangeStatus, 'pending'>;

export interface KeyExchangeRequest {
  requestId: string;
  senderId: SessionId;
  recipientId: SessionId;
  publicKey: string;
  encryptedUserData: string;
  status: KeyExchangeStatus;
  createdAt: number;          // epoch ms
  respondedAt: number | null; // epoch ms, set on the terminal transition
}

export interface InitiateKeyExchangeInput {
  /** Client-suggested id; a ULID is generated when omitted */
  requestId?: string;
  senderId: SessionId;
  recipientId: SessionId;
  publicKey: string;
  encryptedUserData: string;
}

export interface AcceptKeyExchangeInput {
  requestId: string;
  recipientId: SessionId;
  encryptedUserData: string;
}

export interface RejectKeyExchangeInput {
  requestId: string;
  recipientId: SessionId;
}

// -----------------------------------------------------------------------------
// Device Token Types
// -----------------------------------------------------------------------------

export const DEVICE_PLATFORMS = ['ios', 'android'] as const;
export type DevicePlatform = (typeof DEVICE_PLATFORMS)[number];

/** `silent` is data-only (content-available) delivery */
export const DELIVERY_CHANNELS = ['default', 'silent'] as const;
export type DeliveryChannel = (typeof DELIVERY_CHANNELS)[number];

export interface DeviceTokenRecord {
  token: string;
  sessionId: SessionId | null;
  platform: DevicePlatform;
  channel: DeliveryChannel;
  registeredAt: number;
  updatedAt: number;
}

export interface RegisterTokenInput {
  token: string;
  platform: DevicePlatform;
  channel?: DeliveryChannel;
}

// -----------------------------------------------------------------------------
// Presence Types
// -----------------------------------------------------------------------------

export interface SessionPresence {
  sessionId: SessionId;
  connectionHandle: ConnectionHandle;
  lastSeenAt: number;
}

// -----------------------------------------------------------------------------
// Relay Event Types
// -----------------------------------------------------------------------------

export const RELAY_EVENT_KINDS = [
  'key_exchange_request',
  'key_exchange_accepted',
  'key_exchange_rejected',
] as const;
export type RelayEventKind = (typeof RELAY_EVENT_KINDS)[number];

export interface KeyExchangeRequestPayload {
  publicKey: string;
  encryptedUserData: string;
}

export interface KeyExchangeAcceptedPayload {
  encryptedUserData: string;
}

export type KeyExchangeRejectedPayload = Record<string, never>;

interface RelayEventBase<K extends RelayEventKind, P> {
  kind: K;
  requestId: string;
  senderId: SessionId;
  recipientId: SessionId;
  payload: P;
  sentAt: number;
}

export type RelayEvent =
  | RelayEventBase<'key_exchange_request', KeyExchangeRequestPayload>
  | RelayEventBase<'key_exchange_accepted', KeyExchangeAcceptedPayload>
  | RelayEventBase<'key_exchange_rejected', KeyExchangeRejectedPayload>;

// -----------------------------------------------------------------------------
// Delivery Types
// -----------------------------------------------------------------------------

export type DeliveryStatus = 'delivered' | 'partial_failure' | 'failed' | 'undeliverable';

export type DeliveryVia = 'direct' | 'push' | 'none';

export type PushRejectionReason =
  | 'invalid_token'
  | 'expired_token'
  | 'unsupported_platform'
  | 'provider_error'
  | 'timeout'
  | 'not_configured';

export type PushResult =
  | { accepted: true; providerId?: string }
  | { accepted: false; reason: PushRejectionReason; detail?: string };

export interface TokenAttempt {
  token: string;
  platform: DevicePlatform;
  result: PushResult;
}

export interface DeliveryOutcome {
  sessionId: SessionId;
  kind: RelayEventKind;
  status: DeliveryStatus;
  via: DeliveryVia;
  attempts: TokenAttempt[];
}

// -----------------------------------------------------------------------------
// Error Types
// -----------------------------------------------------------------------------

export class RelayError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RelayError';
  }
}

export class InvalidParticipantsError extends RelayError {
  constructor(sessionId: SessionId) {
    super(
      `Sender and recipient must differ (both '${sessionId}')`,
      'INVALID_PARTICIPANTS',
      400
    );
    this.name = 'InvalidParticipantsError';
  }
}

export class DuplicatePendingError extends RelayError {
  constructor(existingRequestId: string) {
    super(
      `A pending key exchange already exists between these sessions`,
      'DUPLICATE_PENDING',
      409,
      { existingRequestId }
    );
    this.name = 'DuplicatePendingError';
  }
}

export class RequestIdConflictError extends RelayError {
  constructor(requestId: string) {
    super(`Request id '${requestId}' is already in use`, 'REQUEST_ID_CONFLICT', 409);
    this.name = 'RequestIdConflictError';
  }
}

export class NotFoundError extends RelayError {
  constructor(requestId: string) {
    super(`Key exchange request '${requestId}' not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class NotRecipientError extends RelayError {
  constructor(requestId: string) {
    super(
      `Session is not the recipient of key exchange request '${requestId}'`,
      'NOT_RECIPIENT',
      403
    );
    this.name = 'NotRecipientError';
  }
}

export class InvalidStateError extends RelayError {
  constructor(requestId: string, status: KeyExchangeStatus) {
    super(
      `Key exchange request '${requestId}' is ${status}, expected pending`,
      'INVALID_STATE',
      409,
      { status }
    );
    this.name = 'InvalidStateError';
  }
}

export class UnknownTokenError extends RelayError {
  constructor(token: string) {
    super(`Device token '${token}' is not registered`, 'UNKNOWN_TOKEN', 404);
    this.name = 'UnknownTokenError';
  }
}
