export type ConfigErrorKind = 'MalformedEntry' | 'DuplicateKey' | 'DanglingReference';

export class ConfigError extends Error {
  readonly kind: ConfigErrorKind;
  readonly entry: string;

  constructor(kind: ConfigErrorKind, entry: string, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.kind = kind;
    this.entry = entry;
  }
}

export type RoutingErrorKind = 'UnknownRepo' | 'AmbiguousRepo' | 'NoTargetResolved' | 'SessionBusy';

const ROUTING_MESSAGES: Record<RoutingErrorKind, string> = {
  UnknownRepo: 'Unknown repository.',
  AmbiguousRepo: 'Several repositories are configured. Pick one with `/repo <short>` or the `repo` option.',
  NoTargetResolved: 'No repository is configured for this chat. Use `/repo <short>` first.',
  SessionBusy: 'You already have a ticket in progress. Finish or cancel it first.',
};

export class RoutingError extends Error {
  readonly kind: RoutingErrorKind;

  constructor(kind: RoutingErrorKind, detail?: string) {
    super(detail ? `${ROUTING_MESSAGES[kind]} (${detail})` : ROUTING_MESSAGES[kind]);
    this.name = 'RoutingError';
    this.kind = kind;
  }
}

export class TicketCreationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TicketCreationError';
  }
}

export class NotificationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotificationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
