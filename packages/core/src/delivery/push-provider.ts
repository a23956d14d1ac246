import type {
  DeliveryChannel,
  DevicePlatform,
  PushResult,
  RelayEvent,
  RelayEventKind,
} from '@keyrelay/shared';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface PushMessage {
  token: string;
  platform: DevicePlatform;
  channel: DeliveryChannel;
  event: RelayEvent;
}

export interface PushProvider {
  readonly name: string;
  send(message: PushMessage): Promise<PushResult>;
}

/** Routing fields carried in a push. Key material never leaves the server this way. */
export interface PushData {
  type: RelayEventKind;
  requestId: string;
  senderId: string;
  recipientId: string;
}

export interface PushAlert {
  title: string;
  body: string;
}

// -----------------------------------------------------------------------------
// Payload Helpers
// -----------------------------------------------------------------------------

const ALERTS: Record<RelayEventKind, PushAlert> = {
  key_exchange_request: {
    title: 'New Contact Request',
    body: 'Someone wants to start a secure conversation with you',
  },
  key_exchange_accepted: {
    title: 'Request Accepted',
    body: 'Your secure conversation request was accepted',
  },
  key_exchange_rejected: {
    title: 'Request Declined',
    body: 'Your secure conversation request was declined',
  },
};

export function toPushData(event: RelayEvent): PushData {
  return {
    type: event.kind,
    requestId: event.requestId,
    senderId: event.senderId,
    recipientId: event.recipientId,
  };
}

export function alertFor(kind: RelayEventKind): PushAlert {
  return ALERTS[kind];
}

// -----------------------------------------------------------------------------
// Disabled Provider
// -----------------------------------------------------------------------------

/**
 * Used when no push credentials are configured. Every token is reported as
 * not deliverable so offline sessions surface as failed deliveries.
 */
export class DisabledPushProvider implements PushProvider {
  readonly name = 'disabled';

  async send(): Promise<PushResult> {
    return { accepted: false, reason: 'not_configured' };
  }
}
