/**
 * DIコンテナ設定ファイル
 *
 * 【tsyringe の基本用語】
 * - Token: 依存オブジェクトを識別するためのキー（通常はSymbol）
 * - register: コンテナに「このTokenならこのクラス/値を使う」というルールを登録
 * - resolve: Tokenを指定して、対応するインスタンスを取得
 * - inject: クラスのコンストラクタで、どの依存が必要かを宣言
 *
 * アカウントのポートフォリオはデモやテストごとに異なるため、ここでは登録しない。
 * app-initializer.ts の runTransactions() が実行時に登録する。
 */

import 'reflect-metadata'; // tsyringe が必要とするメタデータ機能を有効化
import type {DependencyContainer} from 'tsyringe';
import {container} from 'tsyringe';
import {ConsoleTranscriptAdapter} from '../account/adapter/out/transcript/ConsoleTranscriptAdapter';
import {InMemoryTranscriptAdapter} from '../account/adapter/out/transcript/InMemoryTranscriptAdapter';
import {AccountFactory} from '../account/application/domain/service/AccountFactory';
import {
    TransactionProperties,
    TransactionPropertiesToken
} from '../account/application/domain/service/TransactionProperties';
import {WithdrawContractVerifier} from '../account/application/domain/service/WithdrawContractVerifier';
import {ProcessTransactionsUseCaseToken} from '../account/application/port/in/ProcessTransactionsUseCase';
import {TranscriptPortToken} from '../account/application/port/out/TranscriptPort';
import {BankClientService} from '../account/application/service/BankClientService';
import type {ContainerOptions} from './types';

/**
 * DIコンテナへの依存関係の登録
 *
 * 【処理の流れ】
 * 1. 設定オブジェクト（TransactionProperties）の登録
 * 2. 出力アダプター（トランスクリプト）の登録
 * 3. ドメインサービスの登録
 * 4. アプリケーションサービス（UseCase実装）の登録
 *
 * @param options 取引額・トランスクリプトの出力先
 * @param target 登録先のコンテナ（テストでは子コンテナを渡す）
 * @throws Error 取引額の設定が不正な場合
 */
export function setupContainer(
    options: ContainerOptions = {},
    target: DependencyContainer = container
): void {
    console.log('🚀 Initializing DI container...');

    // ========================================
    // 1. 設定オブジェクトの登録
    // ========================================
    target.register(TransactionPropertiesToken, {
        useValue: TransactionProperties.from(options.transactions),
    });

    // ========================================
    // 2. 出力アダプターの登録
    // ========================================

    /**
     * Application層は TranscriptPort にしか依存しない。
     * 出力先の切り替えは登録するアダプターを変えるだけで済む。
     */
    const transcript = options.transcript ?? 'console';

    if (transcript === 'memory') {
        console.log('💾 Using InMemory transcript');
        target.registerSingleton(InMemoryTranscriptAdapter, InMemoryTranscriptAdapter);
        target.register(TranscriptPortToken, {
            useToken: InMemoryTranscriptAdapter,
        });
    } else {
        target.register(TranscriptPortToken, {
            useClass: ConsoleTranscriptAdapter,
        });
    }

    // ========================================
    // 3. ドメインサービスの登録
    // ========================================

    // AccountFactory は採番の状態を持つので、シングルトンで共有する
    target.registerSingleton(AccountFactory, AccountFactory);
    target.registerSingleton(WithdrawContractVerifier, WithdrawContractVerifier);

    // ========================================
    // 4. アプリケーションサービスの登録
    // ========================================
    target.register(ProcessTransactionsUseCaseToken, {
        useClass: BankClientService,
    });

    console.log(`✅ DI container initialized (transcript: ${transcript})`);
}

/**
 * コンテナのインスタンスをクリア（主にテスト用）
 */
export function resetContainer(target: DependencyContainer = container): void {
    target.clearInstances();
    console.log('🔄 DI container reset');
}

export {container};
