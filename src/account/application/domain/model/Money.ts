/**
 * お金を表す値オブジェクト
 * 不変（immutable）で、小数点以下2桁までの金額を扱う
 *
 * 【内部表現】
 * 浮動小数点の誤差を避けるため、最小単位（1/100）の個数を bigint で保持する。
 * 例: 12.34 → 1234n
 */
export class Money {
    /**
     * 1単位あたりの最小単位の数（小数点以下2桁）
     */
    static readonly SCALE = 100n;

    public static readonly ZERO = Money.ofMinorUnits(0n);

    private static readonly DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d{1,2}))?$/;

    private constructor(private readonly minorUnits: bigint) {
    }

    /**
     * 数値・bigint・文字列からMoneyインスタンスを生成
     *
     * - bigint: 整数の金額（例: 1000n → 1000）
     * - number: 小数点以下2桁に丸める（例: 12.5 → 12.5）。最小単位が安全な整数を超える値はエラー
     * - string: "1000" や "12.34" のような10進表記
     *
     * @throws Error 解釈できない値の場合
     */
    static of(value: number | bigint | string): Money {
        if (typeof value === 'bigint') {
            return new Money(value * Money.SCALE);
        }

        if (typeof value === 'number') {
            // 最小単位が安全な整数に収まらない値は受け付けない
            const minorUnits = Math.round(value * Number(Money.SCALE));
            if (!Number.isSafeInteger(minorUnits)) {
                throw new Error(`Invalid money amount: ${String(value)}`);
            }
            return new Money(BigInt(minorUnits));
        }

        return Money.parse(value);
    }

    /**
     * 最小単位の個数から生成
     */
    static ofMinorUnits(minorUnits: bigint): Money {
        return new Money(minorUnits);
    }

    private static parse(text: string): Money {
        const match = Money.DECIMAL_PATTERN.exec(text.trim());
        if (!match) {
            throw new Error(`Invalid money amount: "${text}"`);
        }

        const [, sign, whole, fraction = ''] = match;
        const units = BigInt(whole) * Money.SCALE + BigInt(fraction.padEnd(2, '0'));
        return new Money(sign ? -units : units);
    }

    /**
     * 金額が正の値かどうか
     */
    isPositive(): boolean {
        return this.minorUnits > 0n;
    }

    /**
     * 金額が0または正の値かどうか
     */
    isPositiveOrZero(): boolean {
        return this.minorUnits >= 0n;
    }

    /**
     * 金額が負の値かどうか
     */
    isNegative(): boolean {
        return this.minorUnits < 0n;
    }

    isGreaterThan(other: Money): boolean {
        return this.minorUnits > other.minorUnits;
    }

    isGreaterThanOrEqualTo(other: Money): boolean {
        return this.minorUnits >= other.minorUnits;
    }

    /**
     * 2つのMoneyを加算
     */
    static add(a: Money, b: Money): Money {
        return new Money(a.minorUnits + b.minorUnits);
    }

    plus(other: Money): Money {
        return Money.add(this, other);
    }

    /**
     * 2つのMoneyを減算
     */
    static subtract(a: Money, b: Money): Money {
        return new Money(a.minorUnits - b.minorUnits);
    }

    minus(other: Money): Money {
        return Money.subtract(this, other);
    }

    negate(): Money {
        return new Money(-this.minorUnits);
    }

    /**
     * 最小単位の個数を取得
     */
    getMinorUnits(): bigint {
        return this.minorUnits;
    }

    equals(other: Money): boolean {
        return this.minorUnits === other.minorUnits;
    }

    /**
     * 文字列表現（末尾の0は省略する）
     *
     * 【例】
     * - 1000.00 → "1000"
     * - 12.50   → "12.5"
     * - 0.05    → "0.05"
     */
    toString(): string {
        const absolute = this.minorUnits < 0n ? -this.minorUnits : this.minorUnits;
        const whole = (absolute / Money.SCALE).toString();
        const fraction = (absolute % Money.SCALE).toString().padStart(2, '0').replace(/0+$/, '');
        const sign = this.minorUnits < 0n ? '-' : '';

        return fraction ? `${sign}${whole}.${fraction}` : `${sign}${whole}`;
    }

    /**
     * JSON表現（BigIntは JSON.stringify() できないため文字列に変換）
     */
    toJSON(): { amount: string } {
        return {
            amount: this.toString(),
        };
    }
}
