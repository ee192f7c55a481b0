import type {AccountKind} from '../model/AccountKind';
import type {Money} from '../model/Money';

/**
 * アカウントを生成できない場合のエラー
 *
 * 【発生条件】
 * 初期残高が負の値（balance >= 0 の不変条件を最初から満たせない）
 *
 * 生成処理（open）は Result の Err としてこのエラーを返す。
 */
export class InvalidConstructionException extends Error {
    readonly code = 'INVALID_CONSTRUCTION';

    constructor(
        public readonly kind: AccountKind,
        public readonly initialBalance: Money
    ) {
        super(`Balance can't be negative: ${initialBalance.toString()}`);
        this.name = 'InvalidConstructionException';
    }
}
