/**
 * Subscriptions Module - Domain Errors
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

export interface InvalidSubscriberError {
  readonly type: 'InvalidSubscriberError';
  readonly field: 'email' | 'name';
  readonly message: string;
}

export interface InvalidSubscriptionTokenError {
  readonly type: 'InvalidSubscriptionTokenError';
  readonly message: string;
}

/**
 * Well-formed token that matches no subscription.
 */
export interface UnknownSubscriptionTokenError {
  readonly type: 'UnknownSubscriptionTokenError';
  readonly message: string;
}

export interface ConfirmationEmailError {
  readonly type: 'ConfirmationEmailError';
  readonly message: string;
}

export interface SubscriptionsDatabaseError {
  readonly type: 'DatabaseError';
  readonly message: string;
  readonly cause?: unknown;
}

export type SubscriptionError =
  | InvalidSubscriberError
  | InvalidSubscriptionTokenError
  | UnknownSubscriptionTokenError
  | ConfirmationEmailError
  | SubscriptionsDatabaseError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createInvalidSubscriberError = (
  field: InvalidSubscriberError['field'],
  message: string
): InvalidSubscriberError => ({
  type: 'InvalidSubscriberError',
  field,
  message,
});

export const createInvalidSubscriptionTokenError = (): InvalidSubscriptionTokenError => ({
  type: 'InvalidSubscriptionTokenError',
  message: 'The subscription token is malformed.',
});

export const createUnknownSubscriptionTokenError = (): UnknownSubscriptionTokenError => ({
  type: 'UnknownSubscriptionTokenError',
  message: 'The subscription token does not match any subscription.',
});

export const createConfirmationEmailError = (message: string): ConfirmationEmailError => ({
  type: 'ConfirmationEmailError',
  message,
});

export const createDatabaseError = (
  message: string,
  cause?: unknown
): SubscriptionsDatabaseError => ({
  type: 'DatabaseError',
  message,
  cause,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const SUBSCRIPTION_ERROR_HTTP_STATUS: Record<SubscriptionError['type'], number> = {
  InvalidSubscriberError: 400,
  InvalidSubscriptionTokenError: 400,
  UnknownSubscriptionTokenError: 401,
  ConfirmationEmailError: 500,
  DatabaseError: 500,
};

export const getHttpStatusForError = (error: SubscriptionError): number =>
  SUBSCRIPTION_ERROR_HTTP_STATUS[error.type];
