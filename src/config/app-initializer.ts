import type {DependencyContainer} from 'tsyringe';
import {AccountPortfolioToken} from '../account/application/port/in/AccountPortfolio';
import type {AccountPortfolio} from '../account/application/port/in/AccountPortfolio';
import type {
    ProcessTransactionsUseCase,
    TransactionReport
} from '../account/application/port/in/ProcessTransactionsUseCase';
import {ProcessTransactionsUseCaseToken} from '../account/application/port/in/ProcessTransactionsUseCase';
import {container, resetContainer, setupContainer} from './container';
import type {ContainerOptions} from './types';

/**
 * アプリケーション全体の初期化
 *
 * 【責務】
 * 1. DIコンテナの設定（setupContainer）
 * 2. ポートフォリオを登録して取引を実行（runTransactions）
 */

let isInitialized = false;

export function initializeApplication(options: ContainerOptions = {}): void {
    if (isInitialized) {
        return;
    }

    console.log('🚀 Initializing application...');
    setupContainer(options, container);

    isInitialized = true;
    console.log('✅ Application initialized');
}

/**
 * ポートフォリオを登録し、取引処理ユースケースを実行する
 *
 * @param portfolio 処理対象のアカウント
 * @param target 解決に使うコンテナ
 */
export function runTransactions(
    portfolio: AccountPortfolio,
    target: DependencyContainer = container
): TransactionReport {
    target.register(AccountPortfolioToken, {useValue: portfolio});

    const useCase = target.resolve<ProcessTransactionsUseCase>(ProcessTransactionsUseCaseToken);
    return useCase.processTransactions();
}

export function resetApplication(): void {
    resetContainer(container);
    isInitialized = false;
    console.log('🔄 Application reset');
}
