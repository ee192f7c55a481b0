import type {TransactionPropertiesInput} from '../account/application/domain/service/TransactionProperties';

/**
 * トランスクリプトの出力先
 *
 * - console: 標準出力（デモ実行時）
 * - memory: InMemoryTranscriptAdapter に貯める（テスト・レポート用）
 */
export type TranscriptTarget = 'console' | 'memory';

/**
 * DIコンテナの設定
 */
export interface ContainerOptions {
    transcript?: TranscriptTarget;
    transactions?: TransactionPropertiesInput;
}
