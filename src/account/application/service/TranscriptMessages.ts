import {labelOf} from '../domain/model/AccountKind';
import type {TransactionOutcome} from '../port/in/ProcessTransactionsUseCase';

/**
 * 取引結果をトランスクリプトの1行に変換
 *
 * 【出力例】
 * - Deposited: 1000 in Savings Account. New Balance: 1000
 * - Withdrawn: 500 from Current Account. New Balance: 500
 * - Insufficient funds in Savings Account!
 */
export function formatOutcome(outcome: TransactionOutcome): string {
    const label = labelOf(outcome.kind);
    const amount = outcome.amount.toString();
    const balance = outcome.balanceAfter.toString();

    switch (outcome.status) {
        case 'SUCCEEDED':
            return outcome.operation === 'DEPOSIT'
                ? `Deposited: ${amount} in ${label}. New Balance: ${balance}`
                : `Withdrawn: ${amount} from ${label}. New Balance: ${balance}`;
        case 'INSUFFICIENT_FUNDS':
            return `Insufficient funds in ${label}!`;
        case 'INVALID_AMOUNT':
            return `Invalid amount ${amount} for ${label}!`;
    }
}
