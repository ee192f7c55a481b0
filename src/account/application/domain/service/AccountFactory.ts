import {injectable} from 'tsyringe';
import type {Result} from '../../../../common/result/Result';
import type {InvalidConstructionException} from '../exception/InvalidConstructionException';
import type {DepositCapable, WithdrawCapable} from '../model/AccountCapabilities';
import {AccountId} from '../model/AccountId';
import {DepositOnlyAccount} from '../model/DepositOnlyAccount';
import type {Money} from '../model/Money';
import {WithdrawableAccount} from '../model/WithdrawableAccount';

/**
 * 具体的なアカウント種別を生成するファクトリー
 *
 * 【戻り値の型がポイント】
 * - openSavings / openCurrent → WithdrawCapable
 * - openFixedTerm             → DepositCapable（withdraw を持たない）
 *
 * 定期預金を出金可能なコレクションに入れようとすると、コンパイルエラーになる。
 * 「出金を禁止する」という振る舞いを実行時ではなく型で防ぐ。
 *
 * アカウントIDは 1 から順に採番する。
 */
@injectable()
export class AccountFactory {
    private sequence = 0n;

    openSavings(initialBalance: Money): Result<WithdrawCapable, InvalidConstructionException> {
        return WithdrawableAccount.open(this.nextId(), 'SAVINGS', initialBalance);
    }

    openCurrent(initialBalance: Money): Result<WithdrawCapable, InvalidConstructionException> {
        return WithdrawableAccount.open(this.nextId(), 'CURRENT', initialBalance);
    }

    openFixedTerm(initialBalance: Money): Result<DepositCapable, InvalidConstructionException> {
        return DepositOnlyAccount.open(this.nextId(), 'FIXED_TERM', initialBalance);
    }

    // 生成に失敗した場合も番号は消費する
    private nextId(): AccountId {
        this.sequence += 1n;
        return new AccountId(this.sequence);
    }
}
