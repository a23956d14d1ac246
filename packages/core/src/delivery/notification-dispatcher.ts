import type { DeliveryOutcome, RelayEvent, SessionId } from '@keyrelay/shared';
import type { SessionDirectory } from '../presence/session-directory.js';
import type { TokenLookup } from '../tokens/token-directory.js';
import type { RelayLogger } from '../telemetry/logger.js';
import type { PushProvider } from './push-provider.js';
import {
  DirectDeliveryStage,
  PushDeliveryStage,
  type DeliveryStage,
  type PushStageConfig,
} from './stages.js';
import type { DirectTransport } from './transport.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface EventDeliverer {
  deliver(sessionId: SessionId, event: RelayEvent): Promise<DeliveryOutcome>;
}

export interface NotificationDispatcherOptions {
  sessions: SessionDirectory;
  transport: DirectTransport;
  tokens: TokenLookup;
  provider: PushProvider;
  push?: Partial<PushStageConfig>;
  logger?: RelayLogger;
}

// -----------------------------------------------------------------------------
// Notification Dispatcher
// -----------------------------------------------------------------------------

/**
 * Coordinates delivery between live connections and push notifications.
 * Stages run in order until one reports a conclusive outcome; by default a
 * direct send is tried first and push is the fallback for offline sessions.
 */
export class NotificationDispatcher implements EventDeliverer {
  constructor(
    private stages: DeliveryStage[],
    private logger?: RelayLogger
  ) {}

  async deliver(sessionId: SessionId, event: RelayEvent): Promise<DeliveryOutcome> {
    for (const stage of this.stages) {
      const outcome = await stage.attempt(sessionId, event);
      if (outcome) {
        this.logger?.debug(
          { sessionId, requestId: event.requestId, kind: event.kind, status: outcome.status, via: outcome.via },
          'Event delivery outcome'
        );
        return outcome;
      }
    }

    return { sessionId, kind: event.kind, status: 'undeliverable', via: 'none', attempts: [] };
  }
}

export function createNotificationDispatcher(
  options: NotificationDispatcherOptions
): NotificationDispatcher {
  const stages: DeliveryStage[] = [
    new DirectDeliveryStage(options.sessions, options.transport, options.logger),
    new PushDeliveryStage(options.tokens, options.provider, options.push, options.logger),
  ];

  return new NotificationDispatcher(stages, options.logger);
}
