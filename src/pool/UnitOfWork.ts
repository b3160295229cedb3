/**
 * Unit of work for a single exchange operation.
 *
 * Every store write and token transfer registers how to undo itself. If the
 * operation throws, the undo actions run in reverse order and nothing the
 * operation did remains visible.
 */

import { logger } from '../utils/logger.js';

const log = logger.child('UnitOfWork');

type UndoAction = () => void;

export class UnitOfWork {
    private undoActions: UndoAction[] = [];
    private closed = false;

    onRollback(action: UndoAction): void {
        if (this.closed) {
            throw new Error('Unit of work already closed');
        }
        this.undoActions.push(action);
    }

    get pendingActions(): number {
        return this.undoActions.length;
    }

    commit(): void {
        this.undoActions = [];
        this.closed = true;
    }

    rollback(): void {
        const actions = this.undoActions.reverse();
        this.undoActions = [];
        this.closed = true;

        const failures: unknown[] = [];
        for (const action of actions) {
            try {
                action();
            } catch (error) {
                failures.push(error);
            }
        }

        if (failures.length > 0) {
            log.error(`Rollback left ${failures.length} action(s) unapplied`);
            throw new AggregateError(failures, 'Rollback failed');
        }
    }
}

/**
 * Run `fn` in a fresh unit of work: commit on return, roll back and rethrow on error.
 */
export function runAtomically<T>(fn: (uow: UnitOfWork) => T): T {
    const uow = new UnitOfWork();
    try {
        const result = fn(uow);
        uow.commit();
        return result;
    } catch (error) {
        uow.rollback();
        throw error;
    }
}
