import {injectable} from 'tsyringe';
import type {TranscriptPort} from '../../../application/port/out/TranscriptPort';

/**
 * インメモリ実装のトランスクリプト
 *
 * 【用途】
 * - テストで出力された行をそのまま検証する
 * - 取引結果を画面以外（レポートなど）に渡す
 */
@injectable()
export class InMemoryTranscriptAdapter implements TranscriptPort {
    private readonly lines: string[] = [];

    write(line: string): void {
        this.lines.push(line);
    }

    /**
     * 書き出された行を取得（変更不可）
     */
    getLines(): readonly string[] {
        return [...this.lines];
    }

    clear(): void {
        this.lines.length = 0;
    }
}
