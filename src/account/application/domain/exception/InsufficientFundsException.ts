// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
// InsufficientFundsException（残高不足）
// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
//
// 【この例外クラスの目的】
// - 残高を超える出金が要求されたことを表す
// - 「なぜ失敗したか」の詳細（アカウント、試行金額、現在残高）を保持する
//
// 【throw しない】
// 残高不足は回復可能な失敗なので、withdraw() は Result の Err として返す。
// 呼び出し側は isErr() で判定し、error の各プロパティを参照できる。
// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━

import type {AccountId} from '../model/AccountId';
import type {Money} from '../model/Money';

export class InsufficientFundsException extends Error {
    readonly code = 'INSUFFICIENT_FUNDS';

    /**
     * @param accountId 残高不足が発生したアカウントID
     * @param attemptedAmount 引き出そうとした金額
     * @param currentBalance 現在の残高（出金は行われないので変化しない）
     */
    constructor(
        public readonly accountId: AccountId,
        public readonly attemptedAmount: Money,
        public readonly currentBalance: Money
    ) {
        super(
            `Insufficient funds in account ${accountId.toString()}: ` +
            `attempted to withdraw ${attemptedAmount.toString()}, ` +
            `but current balance is ${currentBalance.toString()}`
        );
        this.name = 'InsufficientFundsException';
    }
}
