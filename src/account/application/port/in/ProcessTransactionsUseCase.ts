import type {AccountId} from '../../domain/model/AccountId';
import type {AccountKind} from '../../domain/model/AccountKind';
import type {Money} from '../../domain/model/Money';
import type {TransactionOperation} from '../../domain/model/TransactionReceipt';

export type TransactionStatus = 'SUCCEEDED' | 'INSUFFICIENT_FUNDS' | 'INVALID_AMOUNT';

/**
 * 1回の入金・出金の結果
 */
export interface TransactionOutcome {
    readonly accountId: AccountId;
    readonly kind: AccountKind;
    readonly operation: TransactionOperation;
    readonly amount: Money;
    readonly status: TransactionStatus;
    /** 操作後の残高（失敗時は変化していない残高） */
    readonly balanceAfter: Money;
}

export interface TransactionReport {
    readonly outcomes: readonly TransactionOutcome[];
}

/**
 * 取引処理ユースケースのインターフェース（入力ポート）
 */
export interface ProcessTransactionsUseCase {
    /**
     * ポートフォリオの全アカウントに対して取引を実行
     *
     * - 出金可能アカウント: 入金してから出金
     * - 入金のみのアカウント: 入金のみ
     */
    processTransactions(): TransactionReport;
}

/**
 * DI用のシンボル
 */
export const ProcessTransactionsUseCaseToken = Symbol('ProcessTransactionsUseCase');
