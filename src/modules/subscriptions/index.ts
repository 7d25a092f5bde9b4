/**
 * Subscriptions Module - Public API
 */

// Core
export * from './core/types.js';
export * from './core/errors.js';
export * from './core/subscriber.js';
export { parseSubscriptionToken } from './core/token.js';
export {
  buildConfirmationEmail,
  buildConfirmationLink,
  buildUnsubscribeLink,
} from './core/confirmation-email.js';
export type {
  SubscriptionsRepository,
  TokenGenerator,
  ConfirmationEmailSender,
} from './core/ports.js';
export { subscribe, type SubscribeDeps, type SubscribeInput } from './core/usecases/subscribe.js';
export {
  confirmSubscription,
  type ConfirmSubscriptionDeps,
  type ConfirmedSubscription,
} from './core/usecases/confirm-subscription.js';
export { unsubscribe, type UnsubscribeDeps } from './core/usecases/unsubscribe.js';

// Shell
export {
  makeSubscriptionsRepo,
  type SubscriptionsRepoOptions,
} from './shell/repo/subscriptions-repo.js';
export { makeTokenGenerator } from './shell/crypto/token-generator.js';
export {
  makeSubscriptionRoutes,
  SUBSCRIBE_SUCCESS_MESSAGE,
  type MakeSubscriptionRoutesDeps,
} from './shell/rest/routes.js';
