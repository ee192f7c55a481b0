/**
 * 取引の記録（トランスクリプト）を出力するための出力ポート
 *
 * 1行 = 1操作の結果。例:
 * "Deposited: 1000 in Savings Account. New Balance: 1000"
 *
 * コンソールに出すか、メモリに貯めるかはアダプターが決める。
 */
export interface TranscriptPort {
    write(line: string): void;
}

/**
 * DI用のシンボル
 */
export const TranscriptPortToken = Symbol('TranscriptPort');
