/**
 * Sync run state machine
 */

import * as E from 'fp-ts/Either';
import type { Either } from 'fp-ts/Either';
import type { SyncStatus } from '../types';
import type { ValidationError } from '../types/errors';
import { validationError } from '../types/errors';

const TRANSITIONS: Readonly<Record<SyncStatus, ReadonlyArray<SyncStatus>>> = {
  queued: ['extracting', 'failed', 'cancelled'],
  extracting: ['transforming', 'completed', 'failed', 'cancelled'],
  transforming: ['resolving', 'failed', 'cancelled'],
  resolving: ['applying', 'failed', 'cancelled'],
  applying: ['extracting', 'completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export const isTerminal = (status: SyncStatus): boolean => TRANSITIONS[status].length === 0;

export const canTransition = (from: SyncStatus, to: SyncStatus): boolean =>
  TRANSITIONS[from].includes(to);

export const transition = (
  from: SyncStatus,
  to: SyncStatus,
): Either<ValidationError, SyncStatus> =>
  canTransition(from, to)
    ? E.right(to)
    : E.left(
        validationError(`Illegal sync transition ${from} -> ${to}`, [
          { path: 'status', message: `${from} cannot move to ${to}` },
        ]),
      );
