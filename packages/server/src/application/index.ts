/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export {
  BroadcastMessageUseCase,
  type BroadcastMessageDeps,
  type BroadcastMessageParams,
  type BroadcastMessageResult,
} from './broadcast-message.js';

export {
  ManageSubscriptionsUseCase,
  type ManageSubscriptionsDeps,
} from './manage-subscriptions.js';
