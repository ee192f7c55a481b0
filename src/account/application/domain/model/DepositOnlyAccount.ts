import type {Result} from '../../../../common/result/Result';
import type {InvalidAmountException} from '../exception/InvalidAmountException';
import type {InvalidConstructionException} from '../exception/InvalidConstructionException';
import type {DepositCapable} from './AccountCapabilities';
import type {AccountId} from './AccountId';
import type {AccountKind, DepositOnlyKind} from './AccountKind';
import {AccountBalance} from './AccountBalance';
import type {Money} from './Money';
import type {TransactionReceipt} from './TransactionReceipt';

/**
 * 入金のみできるアカウント（定期預金など）
 *
 * withdraw() を持たないため、出金できるアカウントのコレクションには入れられない。
 * 「出金を禁止する子クラス」を作る代わりに、型でケイパビリティを分けている。
 */
export class DepositOnlyAccount implements DepositCapable {
    readonly capability = 'DEPOSIT_ONLY';

    private constructor(private readonly balance: AccountBalance) {
    }

    static open(
        accountId: AccountId,
        kind: DepositOnlyKind,
        initialBalance: Money
    ): Result<DepositOnlyAccount, InvalidConstructionException> {
        return AccountBalance.open(accountId, kind, initialBalance)
            .map((balance) => new DepositOnlyAccount(balance));
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
}
