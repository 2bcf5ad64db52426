import path from 'path';
import { AppConfig } from './config';
import { AppServices } from './handlers/types';
import { ChatBackendClient } from './services/chat/chatBackend';
import { ChatTransport, HttpChatTransport } from './services/chat/transport';
import { TurnController } from './services/controller';
import { ToolDispatcher } from './services/dispatcher';
import { DistanceMatrixClient } from './services/distance';
import { DropoffLocator } from './services/operations/dropoffs';
import { SessionStore } from './services/sessionStore';
import { Notifier, TwilioNotifier } from './services/sms';
import { RowStoreOpener, openRowStore } from './services/storage';

export interface ServiceOverrides {
  transport?: ChatTransport;
  openStore?: RowStoreOpener;
  notifier?: Notifier;
  locator?: DropoffLocator;
}

/** Wires every collaborator from config. Tests pass in-process stand-ins through `overrides`. */
export function buildServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
  const transport = overrides.transport ?? new HttpChatTransport(config.chat);
  const password = config.chat.password ?? '';
  const sessions = new SessionStore(
    (userId) => new ChatBackendClient({ transport, userId, password, username: config.chat.username }),
  );

  const dispatcher = new ToolDispatcher({
    openStore: overrides.openStore ?? openRowStore,
    notifier: overrides.notifier ?? new TwilioNotifier(config.twilio),
    locator:
      overrides.locator ??
      new DropoffLocator({
        dir: path.resolve(config.dropoffDir),
        maxMiles: config.dropoffMaxMiles,
        distance: new DistanceMatrixClient(config.distanceApiKey),
      }),
  });

  return {
    databaseUrl: config.databaseUrl,
    logWindow: config.logWindow,
    sessions,
    controller: new TurnController({ sessions, dispatcher, planAttempts: config.planAttempts }),
  };
}
