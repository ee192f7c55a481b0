import type {DepositCapable, WithdrawCapable} from '../../domain/model/AccountCapabilities';

/**
 * Client が扱う2つのアカウントコレクション
 *
 * - withdrawable: 入金と出金ができるアカウント
 * - depositOnly: 入金のみのアカウント
 *
 * 同じアカウント（同じオブジェクト）が両方、または同じ側に2回含まれてはならない。
 * 別々のファクトリーで開設した口座はIDが重なることがあるため、IDでは比較しない。
 */
export class AccountPortfolio {
    private constructor(
        public readonly withdrawable: readonly WithdrawCapable[],
        public readonly depositOnly: readonly DepositCapable[]
    ) {
    }

    /**
     * @throws Error 同じアカウントが複数回含まれている場合
     */
    static of(
        withdrawable: readonly WithdrawCapable[],
        depositOnly: readonly DepositCapable[]
    ): AccountPortfolio {
        const seen = new Set<DepositCapable>();

        for (const account of [...withdrawable, ...depositOnly]) {
            if (seen.has(account)) {
                throw new Error(`Account ${account.getId().toString()} appears more than once in the portfolio`);
            }
            seen.add(account);
        }

        return new AccountPortfolio([...withdrawable], [...depositOnly]);
    }

    size(): number {
        return this.withdrawable.length + this.depositOnly.length;
    }
}

/**
 * DI用のシンボル
 */
export const AccountPortfolioToken = Symbol('AccountPortfolio');
