import type {Result} from '../../../../common/result/Result';
import {err, ok} from '../../../../common/result/Result';
import {InsufficientFundsException} from '../exception/InsufficientFundsException';
import {InvalidAmountException} from '../exception/InvalidAmountException';
import {InvalidConstructionException} from '../exception/InvalidConstructionException';
import type {AccountId} from './AccountId';
import type {AccountKind} from './AccountKind';
import type {Money} from './Money';
import type {TransactionReceipt} from './TransactionReceipt';

/**
 * アカウントの残高（不変条件 balance >= 0 を守る唯一の場所）
 *
 * 【構成】
 * DepositOnlyAccount と WithdrawableAccount は、どちらもこのクラスを内部に持つ。
 * 両者の間に継承関係はない。
 */
export class AccountBalance {
    private constructor(
        private readonly accountId: AccountId,
        private readonly kind: AccountKind,
        private current: Money
    ) {
    }

    /**
     * 初期残高を検証して生成
     *
     * @returns 初期残高が負の場合は InvalidConstructionException
     */
    static open(
        accountId: AccountId,
        kind: AccountKind,
        initialBalance: Money
    ): Result<AccountBalance, InvalidConstructionException> {
        if (initialBalance.isNegative()) {
            return err(new InvalidConstructionException(kind, initialBalance));
        }

        return ok(new AccountBalance(accountId, kind, initialBalance));
    }

    getAccountId(): AccountId {
        return this.accountId;
    }

    getKind(): AccountKind {
        return this.kind;
    }

    get(): Money {
        return this.current;
    }

    /**
     * 残高を増やす（0 は残高を変えずに成功する）
     */
    credit(amount: Money): Result<TransactionReceipt, InvalidAmountException> {
        if (amount.isNegative()) {
            return err(new InvalidAmountException(this.accountId, amount));
        }

        this.current = this.current.plus(amount);
        this.assertInvariant();

        return ok(this.receipt('DEPOSIT', amount));
    }

    /**
     * 残高を減らす（残高が足りない場合は何も変更しない）
     */
    debit(amount: Money): Result<TransactionReceipt, InsufficientFundsException | InvalidAmountException> {
        if (amount.isNegative()) {
            return err(new InvalidAmountException(this.accountId, amount));
        }

        if (!this.current.isGreaterThanOrEqualTo(amount)) {
            return err(new InsufficientFundsException(this.accountId, amount, this.current));
        }

        this.current = this.current.minus(amount);
        this.assertInvariant();

        return ok(this.receipt('WITHDRAWAL', amount));
    }

    private receipt(operation: TransactionReceipt['operation'], amount: Money): TransactionReceipt {
        return {
            accountId: this.accountId,
            kind: this.kind,
            operation,
            amount,
            balanceAfter: this.current,
        };
    }

    // 上の検証を通っていればここには来ない。来た場合は実装の欠陥。
    private assertInvariant(): void {
        if (this.current.isNegative()) {
            throw new Error(
                `Invariant violated: balance of account ${this.accountId.toString()} is ${this.current.toString()}`
            );
        }
    }
}
