import type { TransferableAsset } from '../token/Token.js';
import type { UnitOfWork } from './UnitOfWork.js';
import { AmmError, AmmErrorCode } from './errors.js';

/**
 * Move `amount` of `asset` and register the reverse transfer with the unit of work.
 * A failed transfer fails the whole operation.
 */
export function transferWithinUnit(
    asset: TransferableAsset,
    amount: bigint,
    from: string,
    to: string,
    memo: string,
    uow: UnitOfWork
): void {
    const result = asset.transfer(amount, from, to, memo);
    if (!result.success) {
        throw new AmmError(
            AmmErrorCode.TransferFailed,
            `Transfer of ${amount} ${asset.id} from ${from} failed: ${result.error ?? 'unknown reason'}`
        );
    }

    uow.onRollback(() => {
        const reverted = asset.transfer(amount, to, from, `revert: ${memo}`);
        if (!reverted.success) {
            throw new Error(`Could not revert ${amount} ${asset.id} to ${from}: ${reverted.error ?? 'unknown reason'}`);
        }
    });
}
