import type {Result} from '../../../../common/result/Result';
import type {InsufficientFundsException} from '../exception/InsufficientFundsException';
import type {InvalidAmountException} from '../exception/InvalidAmountException';
import type {InvalidConstructionException} from '../exception/InvalidConstructionException';
import type {WithdrawCapable} from './AccountCapabilities';
import type {AccountId} from './AccountId';
import type {AccountKind, WithdrawableKind} from './AccountKind';
import {AccountBalance} from './AccountBalance';
import type {Money} from './Money';
import type {TransactionReceipt} from './TransactionReceipt';

/**
 * 入金と出金ができるアカウント（普通預金・当座預金）
 *
 * 種別（SAVINGS / CURRENT）はラベルが違うだけで、入出金の振る舞いは同一。
 * そのため、どちらの種別を渡しても呼び出し側の結果は変わらない。
 */
export class WithdrawableAccount implements WithdrawCapable {
    readonly capability = 'DEPOSIT_WITHDRAW';

    private constructor(private readonly balance: AccountBalance) {
    }

    static open(
        accountId: AccountId,
        kind: WithdrawableKind,
        initialBalance: Money
    ): Result<WithdrawableAccount, InvalidConstructionException> {
        return AccountBalance.open(accountId, kind, initialBalance)
            .map((balance) => new WithdrawableAccount(balance));
    }

    getId(): AccountId {
        return this.balance.getAccountId();
    }

    getKind(): AccountKind {
        return this.balance.getKind();
    }

    getBalance(): Money {
        return this.balance.get();
    }

    deposit(amount: Money): Result<TransactionReceipt, InvalidAmountException> {
        return this.balance.credit(amount);
    }

    /**
     * 出金を実行
     *
     * @returns 残高不足の場合は InsufficientFundsException（残高は変わらない）
     */
    withdraw(amount: Money): Result<TransactionReceipt, InsufficientFundsException | InvalidAmountException> {
        return this.balance.debit(amount);
    }
}
