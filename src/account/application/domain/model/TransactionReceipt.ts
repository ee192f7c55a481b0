import type {AccountId} from './AccountId';
import type {AccountKind} from './AccountKind';
import type {Money} from './Money';

export type TransactionOperation = 'DEPOSIT' | 'WITHDRAWAL';

/**
 * 入金・出金が成功したときの控え
 */
export interface TransactionReceipt {
    readonly accountId: AccountId;
    readonly kind: AccountKind;
    readonly operation: TransactionOperation;
    readonly amount: Money;
    /** 操作後の残高 */
    readonly balanceAfter: Money;
}
