import {z} from 'zod';
import {Money} from '../model/Money';

/**
 * 金額の入力スキーマ（数値または "12.34" 形式の文字列、正の値のみ）
 *
 * Money に変換できない値（桁が多すぎる・大きすぎる等）は例外ではなく検証エラーにする。
 */
const AmountSchema = z
    .union([z.number(), z.string()])
    .transform((value, ctx): Money => {
        let money: Money;
        try {
            money = Money.of(value);
        } catch (error) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: error instanceof Error ? error.message : String(error),
            });
            return z.NEVER;
        }

        if (!money.isPositive()) {
            ctx.addIssue({code: z.ZodIssueCode.custom, message: 'amount must be positive'});
            return z.NEVER;
        }

        return money;
    });

/**
 * 取引設定の入力スキーマ（省略した項目は既定値）
 */
export const TransactionPropertiesSchema = z.object({
    withdrawableDeposit: AmountSchema.default(1000),
    withdrawableWithdrawal: AmountSchema.default(500),
    depositOnlyDeposit: AmountSchema.default(5000),
});

export type TransactionPropertiesInput = z.input<typeof TransactionPropertiesSchema>;

/**
 * 取引処理（processTransactions）の設定プロパティ
 *
 * - withdrawableDeposit: 出金可能アカウントへの入金額
 * - withdrawableWithdrawal: 出金可能アカウントからの出金額
 * - depositOnlyDeposit: 入金のみのアカウントへの入金額
 */
export class TransactionProperties {
    constructor(
        public readonly withdrawableDeposit: Money,
        public readonly withdrawableWithdrawal: Money,
        public readonly depositOnlyDeposit: Money
    ) {
    }

    /**
     * 入力値を検証して生成
     *
     * @throws Error 入力値が不正な場合
     */
    static from(input: TransactionPropertiesInput = {}): TransactionProperties {
        const result = TransactionPropertiesSchema.safeParse(input);

        if (!result.success) {
            throw new Error(
                `Invalid TransactionProperties: ${result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`
            );
        }

        return new TransactionProperties(
            result.data.withdrawableDeposit,
            result.data.withdrawableWithdrawal,
            result.data.depositOnlyDeposit
        );
    }
}

/**
 * DI用のシンボル
 */
export const TransactionPropertiesToken = Symbol('TransactionProperties');
