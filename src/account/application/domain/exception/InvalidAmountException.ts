import type {AccountId} from '../model/AccountId';
import type {Money} from '../model/Money';

/**
 * 入金・出金の金額が負の値の場合のエラー
 */
export class InvalidAmountException extends Error {
    readonly code = 'INVALID_AMOUNT';

    constructor(
        public readonly accountId: AccountId,
        public readonly amount: Money
    ) {
        super(`Amount can't be negative: ${amount.toString()} (account ${accountId.toString()})`);
        this.name = 'InvalidAmountException';
    }
}
