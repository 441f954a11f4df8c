/**
 * Shop Module - Domain Errors
 */

import { PLAYER_ERROR_HTTP_STATUS, type PlayerStoreError } from '../../players/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Error Interfaces
// ─────────────────────────────────────────────────────────────────────────────

export interface RewardNotFoundError {
  readonly type: 'RewardNotFoundError';
  readonly reason: 'NotFound';
  readonly message: string;
  readonly rewardId: string;
}

export interface RewardAlreadyOwnedError {
  readonly type: 'RewardAlreadyOwnedError';
  readonly reason: 'AlreadyOwned';
  readonly message: string;
  readonly rewardId: string;
}

export interface InsufficientFundsError {
  readonly type: 'InsufficientFundsError';
  readonly reason: 'InsufficientFunds';
  readonly message: string;
  readonly rewardId: string;
  readonly cost: number;
  readonly available: number;
}

export type ShopError = RewardNotFoundError | RewardAlreadyOwnedError | InsufficientFundsError;

export type PurchaseError = ShopError | PlayerStoreError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createRewardNotFoundError = (rewardId: string): RewardNotFoundError => ({
  type: 'RewardNotFoundError',
  reason: 'NotFound',
  message: `Shop reward '${rewardId}' does not exist`,
  rewardId,
});

export const createRewardAlreadyOwnedError = (rewardId: string): RewardAlreadyOwnedError => ({
  type: 'RewardAlreadyOwnedError',
  reason: 'AlreadyOwned',
  message: `Shop reward '${rewardId}' is already owned`,
  rewardId,
});

export const createInsufficientFundsError = (
  rewardId: string,
  cost: number,
  available: number
): InsufficientFundsError => ({
  type: 'InsufficientFundsError',
  reason: 'InsufficientFunds',
  message: `Shop reward '${rewardId}' costs ${String(cost)} coins but only ${String(available)} are available`,
  rewardId,
  cost,
  available,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const SHOP_ERROR_HTTP_STATUS: Record<PurchaseError['type'], number> = {
  RewardNotFoundError: 404,
  RewardAlreadyOwnedError: 409,
  InsufficientFundsError: 409,
  DatabaseError: PLAYER_ERROR_HTTP_STATUS.DatabaseError,
  PlayerNotFoundError: PLAYER_ERROR_HTTP_STATUS.PlayerNotFoundError,
};

export const getHttpStatusForError = (error: PurchaseError): number => {
  return SHOP_ERROR_HTTP_STATUS[error.type];
};
