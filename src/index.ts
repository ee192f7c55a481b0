import 'reflect-metadata';
import type {WithdrawCapable} from './account/application/domain/model/AccountCapabilities';
import {Money} from './account/application/domain/model/Money';
import {AccountFactory} from './account/application/domain/service/AccountFactory';
import {WithdrawContractVerifier} from './account/application/domain/service/WithdrawContractVerifier';
import {AccountPortfolio} from './account/application/port/in/AccountPortfolio';
import type {Result} from './common/result/Result';
import {initializeApplication, runTransactions} from './config/app-initializer';
import {container} from './config/container';

/**
 * デモ: 普通預金・当座預金・定期預金を残高0で開設し、取引を実行する
 *
 * 【出力】
 * Deposited: 1000 in Savings Account. New Balance: 1000
 * Withdrawn: 500 from Savings Account. New Balance: 500
 * Deposited: 1000 in Current Account. New Balance: 1000
 * Withdrawn: 500 from Current Account. New Balance: 500
 * Deposited: 5000 in Fixed Term Account. New Balance: 5000
 */
export function main(): void {
    initializeApplication({transcript: 'console'});

    const factory = container.resolve(AccountFactory);

    const portfolio = AccountPortfolio.of(
        [
            orThrow(factory.openSavings(Money.ZERO)),
            orThrow(factory.openCurrent(Money.ZERO)),
        ],
        [
            orThrow(factory.openFixedTerm(Money.ZERO)),
        ]
    );

    runTransactions(portfolio);

    // 出金可能な種別が同じ契約を守っているかを確認
    const verifier = container.resolve(WithdrawContractVerifier);
    const openers: Record<string, (initial: Money) => WithdrawCapable> = {
        'Savings Account': (initial) => orThrow(factory.openSavings(initial)),
        'Current Account': (initial) => orThrow(factory.openCurrent(initial)),
    };

    for (const [label, open] of Object.entries(openers)) {
        const violations = verifier.verify(open);
        if (violations.length === 0) {
            console.log(`✅ ${label} honors the withdraw contract`);
        } else {
            violations.forEach((violation) => {
                console.error(`❌ ${label} violates ${violation.rule}: ${violation.message}`);
            });
        }
    }
}

// 開設に失敗した場合、このデモは続行できない
function orThrow<T>(result: Result<T, Error>): T {
    if (result.isErr()) {
        throw result.error;
    }
    return result.value;
}

if (require.main === module) {
    main();
}
