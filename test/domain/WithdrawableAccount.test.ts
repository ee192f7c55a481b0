import {describe, expect, it} from "vitest";
import {InsufficientFundsException} from "../../src/account/application/domain/exception/InsufficientFundsException";
import {InvalidAmountException} from "../../src/account/application/domain/exception/InvalidAmountException";
import {InvalidConstructionException} from "../../src/account/application/domain/exception/InvalidConstructionException";
import {AccountId} from "../../src/account/application/domain/model/AccountId";
import {Money} from "../../src/account/application/domain/model/Money";
import {WithdrawableAccount} from "../../src/account/application/domain/model/WithdrawableAccount";
import {expectErr, expectOk} from "../helpers/accounts";


describe("WithdrawableAccount", () => {
    const accountId = new AccountId(1n);

    const open = (initialBalance: number) =>
        expectOk(WithdrawableAccount.open(accountId, "SAVINGS", Money.of(initialBalance)));

    // ========================================
    // 生成
    // ========================================

    it("初期残高を指定して生成できる", () => {
        // Act
        const account = open(100);

        // Assert
        expect(account.getId()).toBe(accountId);
        expect(account.getKind()).toBe("SAVINGS");
        expect(account.capability).toBe("DEPOSIT_WITHDRAW");
        expect(account.getBalance().toString()).toBe("100");
    });

    it("初期残高0で生成できる", () => {
        expect(open(0).getBalance().equals(Money.ZERO)).toBe(true);
    });

    it("初期残高が負の場合は InvalidConstructionException", () => {
        // Act
        const error = expectErr(WithdrawableAccount.open(accountId, "CURRENT", Money.of(-10)));

        // Assert
        expect(error).toBeInstanceOf(InvalidConstructionException);
        expect(error.code).toBe("INVALID_CONSTRUCTION");
        expect(error.kind).toBe("CURRENT");
        expect(error.initialBalance.toString()).toBe("-10");
        expect(error.message).toBe("Balance can't be negative: -10");
    });

    // ========================================
    // 入金
    // ========================================

    it("入金すると残高がちょうど入金額だけ増える", () => {
        // Arrange
        const account = open(100);

        // Act
        const receipt = expectOk(account.deposit(Money.of(1000)));

        // Assert
        expect(account.getBalance().toString()).toBe("1100");
        expect(receipt.operation).toBe("DEPOSIT");
        expect(receipt.amount.toString()).toBe("1000");
        expect(receipt.balanceAfter.toString()).toBe("1100");
        expect(receipt.accountId).toBe(accountId);
        expect(receipt.kind).toBe("SAVINGS");
    });

    it("小数の金額も入金できる", () => {
        // Arrange
        const account = open(0);

        // Act
        expectOk(account.deposit(Money.of("0.1")));
        expectOk(account.deposit(Money.of("0.2")));

        // Assert
        expect(account.getBalance().toString()).toBe("0.3");
    });

    it("0の入金は成功し、残高は変わらない", () => {
        // Arrange
        const account = open(100);

        // Act
        const receipt = expectOk(account.deposit(Money.ZERO));

        // Assert
        expect(receipt.amount.toString()).toBe("0");
        expect(receipt.balanceAfter.toString()).toBe("100");
        expect(account.getBalance().toString()).toBe("100");
    });

    it("負の入金は InvalidAmountException で、残高は変わらない", () => {
        // Arrange
        const account = open(100);

        // Act
        const negative = expectErr(account.deposit(Money.of(-5)));

        // Assert
        expect(negative).toBeInstanceOf(InvalidAmountException);
        expect(negative.code).toBe("INVALID_AMOUNT");
        expect(negative.message).toBe("Amount can't be negative: -5 (account 1)");
        expect(account.getBalance().toString()).toBe("100");
    });

    // ========================================
    // 出金
    // ========================================

    it("残高が十分な場合、出金に成功する", () => {
        // Arrange
        const account = open(1100);

        // Act
        const receipt = expectOk(account.withdraw(Money.of(500)));

        // Assert
        expect(account.getBalance().toString()).toBe("600");
        expect(receipt.operation).toBe("WITHDRAWAL");
        expect(receipt.balanceAfter.toString()).toBe("600");
    });

    it("残高ちょうどの金額は出金できる", () => {
        // Arrange
        const account = open(100);

        // Act
        expectOk(account.withdraw(Money.of(100)));

        // Assert
        expect(account.getBalance().equals(Money.ZERO)).toBe(true);
    });

    it("残高が不足している場合、InsufficientFundsException で残高は変わらない", () => {
        // Arrange
        const account = open(0);

        // Act
        const error = expectErr(account.withdraw(Money.of(50)));

        // Assert
        expect(error).toBeInstanceOf(InsufficientFundsException);
        expect(error.code).toBe("INSUFFICIENT_FUNDS");
        if (error instanceof InsufficientFundsException) {
            expect(error.accountId).toBe(accountId);
            expect(error.attemptedAmount.toString()).toBe("50");
            expect(error.currentBalance.toString()).toBe("0");
        }
        expect(error.message).toBe(
            "Insufficient funds in account 1: attempted to withdraw 50, but current balance is 0"
        );
        expect(account.getBalance().equals(Money.ZERO)).toBe(true);
    });

    it("0の出金は成功し、残高は変わらない", () => {
        // Arrange
        const account = open(0);

        // Act
        const receipt = expectOk(account.withdraw(Money.ZERO));

        // Assert
        expect(receipt.operation).toBe("WITHDRAWAL");
        expect(account.getBalance().equals(Money.ZERO)).toBe(true);
    });

    it("負の出金は InvalidAmountException", () => {
        // Arrange
        const account = open(100);

        // Act
        const error = expectErr(account.withdraw(Money.of(-1)));

        // Assert
        expect(error).toBeInstanceOf(InvalidAmountException);
        expect(account.getBalance().toString()).toBe("100");
    });

    // ========================================
    // シナリオ
    // ========================================

    it("残高100 → 1000入金で1100 → 500出金で600", () => {
        // Arrange
        const account = open(100);

        // Act & Assert
        expectOk(account.deposit(Money.of(1000)));
        expect(account.getBalance().toString()).toBe("1100");

        expectOk(account.withdraw(Money.of(500)));
        expect(account.getBalance().toString()).toBe("600");
    });

    it("複数回の入金と出金を通して残高は常に0以上", () => {
        // Arrange
        const account = open(1000);
        const operations: Array<["deposit" | "withdraw", number]> = [
            ["deposit", 200],   // 1000 + 200 = 1200
            ["withdraw", 100],  // 1200 - 100 = 1100
            ["withdraw", 5000], // 残高不足 → 1100 のまま
            ["deposit", 50],    // 1100 + 50 = 1150
            ["withdraw", 1150], // 1150 - 1150 = 0
            ["withdraw", 1],    // 残高不足 → 0 のまま
        ];

        // Act
        for (const [operation, amount] of operations) {
            if (operation === "deposit") {
                account.deposit(Money.of(amount));
            } else {
                account.withdraw(Money.of(amount));
            }

            // Assert
            expect(account.getBalance().isPositiveOrZero()).toBe(true);
        }

        expect(account.getBalance().equals(Money.ZERO)).toBe(true);
    });
});
