import {inject, injectable} from 'tsyringe';
import type {Result} from '../../../common/result/Result';
import type {InsufficientFundsException} from '../domain/exception/InsufficientFundsException';
import type {InvalidAmountException} from '../domain/exception/InvalidAmountException';
import type {DepositCapable, WithdrawCapable} from '../domain/model/AccountCapabilities';
import type {Money} from '../domain/model/Money';
import type {TransactionOperation, TransactionReceipt} from '../domain/model/TransactionReceipt';
import {TransactionProperties, TransactionPropertiesToken} from '../domain/service/TransactionProperties';
import {AccountPortfolio, AccountPortfolioToken} from '../port/in/AccountPortfolio';
import type {
    ProcessTransactionsUseCase,
    TransactionOutcome,
    TransactionReport
} from '../port/in/ProcessTransactionsUseCase';
import type {TranscriptPort} from '../port/out/TranscriptPort';
import {TranscriptPortToken} from '../port/out/TranscriptPort';
import {formatOutcome} from './TranscriptMessages';

/**
 * 取引処理アプリケーションサービス（Client）
 *
 * 役割: ポートフォリオの各アカウントに、契約が許す操作だけを実行する
 *
 * 【置換可能性】
 * - 出金可能アカウントは WithdrawCapable としてしか扱わない
 *   → 普通預金でも当座預金でも、同じコードパスを通る
 * - 入金のみのアカウントには deposit() しか呼ばない
 *   → withdraw() を呼ぶコードパスがそもそも存在しない
 * - 具体的な種別（kind）で分岐しない
 */
@injectable()
export class BankClientService implements ProcessTransactionsUseCase {
    constructor(
        @inject(AccountPortfolioToken)
        private readonly portfolio: AccountPortfolio,
        @inject(TransactionPropertiesToken)
        private readonly properties: TransactionProperties,
        @inject(TranscriptPortToken)
        private readonly transcript: TranscriptPort
    ) {
    }

    processTransactions(): TransactionReport {
        const outcomes: TransactionOutcome[] = [];

        // ① 出金可能アカウント: 入金してから出金
        for (const account of this.portfolio.withdrawable) {
            outcomes.push(this.deposit(account, this.properties.withdrawableDeposit));
            outcomes.push(this.withdraw(account, this.properties.withdrawableWithdrawal));
        }

        // ② 入金のみのアカウント: 入金だけ
        for (const account of this.portfolio.depositOnly) {
            outcomes.push(this.deposit(account, this.properties.depositOnlyDeposit));
        }

        return {outcomes};
    }

    private deposit(account: DepositCapable, amount: Money): TransactionOutcome {
        return this.record(account, 'DEPOSIT', amount, account.deposit(amount));
    }

    private withdraw(account: WithdrawCapable, amount: Money): TransactionOutcome {
        return this.record(account, 'WITHDRAWAL', amount, account.withdraw(amount));
    }

    /**
     * 結果をトランスクリプトに書き出し、取引結果として返す
     */
    private record(
        account: DepositCapable,
        operation: TransactionOperation,
        amount: Money,
        result: Result<TransactionReceipt, InsufficientFundsException | InvalidAmountException>
    ): TransactionOutcome {
        const outcome: TransactionOutcome = {
            accountId: account.getId(),
            kind: account.getKind(),
            operation,
            amount,
            status: result.isOk() ? 'SUCCEEDED' : result.error.code,
            balanceAfter: account.getBalance(),
        };

        this.transcript.write(formatOutcome(outcome));
        return outcome;
    }
}
