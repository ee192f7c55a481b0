/**
 * 失敗し得る操作の結果を表す型
 *
 * 【役割】
 * - 回復可能な失敗（残高不足など）を throw せずに呼び出し側へ返す
 * - 呼び出し側は isOk() / isErr() で分岐してから値やエラーを取り出す
 *
 * 【使用例】
 * ```typescript
 * const result = account.withdraw(Money.of(500))
 * if (result.isErr()) {
 *     console.log(result.error.message)
 *     return
 * }
 * console.log(result.value.balanceAfter.toString())
 * ```
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
    readonly ok = true;

    constructor(public readonly value: T) {
    }

    isOk(): this is Ok<T, E> {
        return true;
    }

    isErr(): this is Err<T, E> {
        return false;
    }

    /**
     * 値を変換した新しい Result を返す
     */
    map<U>(fn: (value: T) => U): Result<U, E> {
        return new Ok<U, E>(fn(this.value));
    }

    /**
     * エラーを変換する（Ok では何もしない）
     */
    mapErr<F>(_fn: (error: E) => F): Result<T, F> {
        return new Ok<T, F>(this.value);
    }

    unwrapOr(_defaultValue: T): T {
        return this.value;
    }
}

export class Err<T, E> {
    readonly ok = false;

    constructor(public readonly error: E) {
    }

    isOk(): this is Ok<T, E> {
        return false;
    }

    isErr(): this is Err<T, E> {
        return true;
    }

    map<U>(_fn: (value: T) => U): Result<U, E> {
        return new Err<U, E>(this.error);
    }

    mapErr<F>(fn: (error: E) => F): Result<T, F> {
        return new Err<T, F>(fn(this.error));
    }

    unwrapOr(defaultValue: T): T {
        return defaultValue;
    }
}

/** 成功した結果を生成 */
export const ok = <T, E = never>(value: T): Result<T, E> => new Ok<T, E>(value);

/** 失敗した結果を生成 */
export const err = <T = never, E = Error>(error: E): Result<T, E> => new Err<T, E>(error);
