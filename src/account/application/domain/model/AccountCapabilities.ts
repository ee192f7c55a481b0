import type {Result} from '../../../../common/result/Result';
import type {InsufficientFundsException} from '../exception/InsufficientFundsException';
import type {InvalidAmountException} from '../exception/InvalidAmountException';
import type {AccountId} from './AccountId';
import type {AccountKind, Capability} from './AccountKind';
import type {Money} from './Money';
import type {TransactionReceipt} from './TransactionReceipt';

/**
 * 入金できるアカウントの契約
 *
 * 【事後条件】
 * - 正の金額 a を入金すると、残高はちょうど a 増える
 * - 残高が減ることはない（balance >= 0 を常に満たす）
 */
export interface DepositCapable {
    readonly capability: Capability;

    getId(): AccountId;

    getKind(): AccountKind;

    getBalance(): Money;

    /**
     * 入金を実行
     *
     * @returns 成功時は控え（0 は残高を変えずに成功）、金額が負の場合は InvalidAmountException
     */
    deposit(amount: Money): Result<TransactionReceipt, InvalidAmountException>;
}

/**
 * 入金と出金ができるアカウントの契約
 *
 * 【置換可能性のルール】
 * この契約を名乗る全ての実装は、withdraw() について同じ事前条件・事後条件を守る。
 * - 残高が足りていれば必ず成功する（出金そのものを禁止してはならない：履歴制約）
 * - 残高が足りなければ InsufficientFundsException を返し、残高は変えない
 * - 出金後も balance >= 0（不変条件を弱めてはならない）
 *
 * 出金を一切許さない種別はこの契約を名乗らず、DepositCapable のみを実装する。
 */
export interface WithdrawCapable extends DepositCapable {
    readonly capability: 'DEPOSIT_WITHDRAW';

    withdraw(amount: Money): Result<TransactionReceipt, InsufficientFundsException | InvalidAmountException>;
}
