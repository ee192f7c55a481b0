import {injectable} from 'tsyringe';
import type {Result} from '../../../../common/result/Result';
import type {InsufficientFundsException} from '../exception/InsufficientFundsException';
import type {InvalidAmountException} from '../exception/InvalidAmountException';
import type {WithdrawCapable} from '../model/AccountCapabilities';
import {Money} from '../model/Money';
import type {TransactionOperation, TransactionReceipt} from '../model/TransactionReceipt';

/**
 * 違反した契約の種類
 *
 * - HISTORY_CONSTRAINT: 親の契約が許している出金を、実装が禁止している
 * - POSTCONDITION: 操作後の残高や結果が契約どおりでない
 * - CLASS_INVARIANT: balance >= 0 が破られた
 */
export type ContractRule = 'HISTORY_CONSTRAINT' | 'POSTCONDITION' | 'CLASS_INVARIANT';

export interface ContractViolation {
    readonly rule: ContractRule;
    readonly message: string;
}

/**
 * 指定した初期残高で、検査対象のアカウントを新しく生成する関数
 */
export type AccountOpener = (initialBalance: Money) => WithdrawCapable;

export interface ScenarioStep {
    readonly operation: TransactionOperation;
    readonly amount: Money;
}

export type StepOutcome = 'SUCCEEDED' | 'INSUFFICIENT_FUNDS' | 'INVALID_AMOUNT';

export interface ScenarioTrace {
    readonly outcomes: readonly StepOutcome[];
    readonly finalBalance: Money;
}

export interface SubstitutionComparison {
    readonly identical: boolean;
    readonly left: ScenarioTrace;
    readonly right: ScenarioTrace;
}

type ProbeOutcome = StepOutcome | { readonly thrown: string };

/**
 * 出金可能アカウントの契約検査
 *
 * WithdrawCapable を名乗る実装が、他の実装と置き換え可能かどうかを
 * 固定の検査シナリオで確かめる。
 *
 * 【検査シナリオ】
 * 1. 残高100から50を出金 → 成功し、残高は50（履歴制約・事後条件）
 * 2. 残高0から50を出金 → 残高不足で失敗し、残高は0のまま（不変条件・事後条件）
 * 3. 残高100に25を入金 → 残高は125（事後条件）
 */
@injectable()
export class WithdrawContractVerifier {
    verify(open: AccountOpener): ContractViolation[] {
        return [
            ...this.probeAllowedWithdrawal(open),
            ...this.probeOverdraft(open),
            ...this.probeDeposit(open),
        ];
    }

    /**
     * 同じ操作列を1つのアカウントに適用し、各操作の結果と最終残高を記録する
     */
    replay(account: WithdrawCapable, steps: readonly ScenarioStep[]): ScenarioTrace {
        const outcomes = steps.map((step): StepOutcome => {
            const result: Result<TransactionReceipt, InsufficientFundsException | InvalidAmountException> =
                step.operation === 'DEPOSIT'
                    ? account.deposit(step.amount)
                    : account.withdraw(step.amount);

            return result.isOk() ? 'SUCCEEDED' : result.error.code;
        });

        return {outcomes, finalBalance: account.getBalance()};
    }

    /**
     * 2つの実装に同じ初期残高・同じ操作列を与え、結果が一致するかを比較する
     */
    compareSubstitutes(
        openLeft: AccountOpener,
        openRight: AccountOpener,
        initialBalance: Money,
        steps: readonly ScenarioStep[]
    ): SubstitutionComparison {
        const left = this.replay(openLeft(initialBalance), steps);
        const right = this.replay(openRight(initialBalance), steps);

        const identical =
            left.finalBalance.equals(right.finalBalance) &&
            left.outcomes.length === right.outcomes.length &&
            left.outcomes.every((outcome, index) => outcome === right.outcomes[index]);

        return {identical, left, right};
    }

    // ① 残高が足りている出金は必ず成功しなければならない
    private probeAllowedWithdrawal(open: AccountOpener): ContractViolation[] {
        const account = open(Money.of(100));
        const outcome = this.attemptWithdraw(account, Money.of(50));

        if (outcome !== 'SUCCEEDED') {
            return [{
                rule: 'HISTORY_CONSTRAINT',
                message: `withdraw of 50 from balance 100 was rejected (${describeOutcome(outcome)})`,
            }];
        }

        if (!account.getBalance().equals(Money.of(50))) {
            return [{
                rule: 'POSTCONDITION',
                message: `expected balance 50 after withdrawing 50 from 100, got ${account.getBalance().toString()}`,
            }];
        }

        return [];
    }

    // ② 残高を超える出金は残高不足で失敗し、残高を変えてはならない
    private probeOverdraft(open: AccountOpener): ContractViolation[] {
        const account = open(Money.ZERO);
        const outcome = this.attemptWithdraw(account, Money.of(50));
        const balance = account.getBalance();

        if (balance.isNegative()) {
            return [{
                rule: 'CLASS_INVARIANT',
                message: `balance became ${balance.toString()} after withdrawing 50 from 0`,
            }];
        }

        if (outcome !== 'INSUFFICIENT_FUNDS') {
            return [{
                rule: 'POSTCONDITION',
                message: `expected INSUFFICIENT_FUNDS when withdrawing 50 from 0, got ${describeOutcome(outcome)}`,
            }];
        }

        if (!balance.equals(Money.ZERO)) {
            return [{
                rule: 'POSTCONDITION',
                message: `balance changed to ${balance.toString()} after a rejected withdraw`,
            }];
        }

        return [];
    }

    // ③ 入金は金額ちょうど残高を増やす
    private probeDeposit(open: AccountOpener): ContractViolation[] {
        const account = open(Money.of(100));
        const outcome = this.attemptDeposit(account, Money.of(25));

        if (outcome !== 'SUCCEEDED') {
            return [{
                rule: 'POSTCONDITION',
                message: `deposit of 25 into balance 100 was rejected (${describeOutcome(outcome)})`,
            }];
        }

        if (!account.getBalance().equals(Money.of(125))) {
            return [{
                rule: 'POSTCONDITION',
                message: `expected balance 125 after depositing 25 into 100, got ${account.getBalance().toString()}`,
            }];
        }

        return [];
    }

    // 契約外の throw も検査結果として扱う
    private attemptWithdraw(account: WithdrawCapable, amount: Money): ProbeOutcome {
        try {
            const result = account.withdraw(amount);
            return result.isOk() ? 'SUCCEEDED' : result.error.code;
        } catch (error) {
            return {thrown: error instanceof Error ? error.message : String(error)};
        }
    }

    private attemptDeposit(account: WithdrawCapable, amount: Money): ProbeOutcome {
        try {
            const result = account.deposit(amount);
            return result.isOk() ? 'SUCCEEDED' : result.error.code;
        } catch (error) {
            return {thrown: error instanceof Error ? error.message : String(error)};
        }
    }
}

function describeOutcome(outcome: ProbeOutcome): string {
    return typeof outcome === 'string' ? outcome : `threw "${outcome.thrown}"`;
}
