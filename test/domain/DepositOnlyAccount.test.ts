import {describe, expect, it} from "vitest";
import {InvalidAmountException} from "../../src/account/application/domain/exception/InvalidAmountException";
import {InvalidConstructionException} from "../../src/account/application/domain/exception/InvalidConstructionException";
import {AccountId} from "../../src/account/application/domain/model/AccountId";
import {DepositOnlyAccount} from "../../src/account/application/domain/model/DepositOnlyAccount";
import {Money} from "../../src/account/application/domain/model/Money";
import {expectErr, expectOk} from "../helpers/accounts";


describe("DepositOnlyAccount", () => {
    const accountId = new AccountId(7n);

    it("入金のみのケイパビリティで生成される", () => {
        // Act
        const account = expectOk(DepositOnlyAccount.open(accountId, "FIXED_TERM", Money.of(100)));

        // Assert
        expect(account.capability).toBe("DEPOSIT_ONLY");
        expect(account.getKind()).toBe("FIXED_TERM");
        expect(account.getBalance().toString()).toBe("100");
    });

    it("withdraw メソッドを持たない", () => {
        // Arrange
        const account = expectOk(DepositOnlyAccount.open(accountId, "FIXED_TERM", Money.ZERO));

        // Assert
        expect("withdraw" in account).toBe(false);
    });

    it("入金すると残高がちょうど入金額だけ増える", () => {
        // Arrange
        const account = expectOk(DepositOnlyAccount.open(accountId, "FIXED_TERM", Money.ZERO));

        // Act
        const receipt = expectOk(account.deposit(Money.of(5000)));

        // Assert
        expect(account.getBalance().toString()).toBe("5000");
        expect(receipt.operation).toBe("DEPOSIT");
        expect(receipt.balanceAfter.toString()).toBe("5000");
    });

    it("0の入金は成功し、残高は変わらない", () => {
        // Arrange
        const account = expectOk(DepositOnlyAccount.open(accountId, "FIXED_TERM", Money.of(10)));

        // Act
        expectOk(account.deposit(Money.ZERO));

        // Assert
        expect(account.getBalance().toString()).toBe("10");
    });

    it("負の入金は InvalidAmountException", () => {
        // Arrange
        const account = expectOk(DepositOnlyAccount.open(accountId, "FIXED_TERM", Money.of(10)));

        // Act
        const error = expectErr(account.deposit(Money.of(-1)));

        // Assert
        expect(error).toBeInstanceOf(InvalidAmountException);
        expect(account.getBalance().toString()).toBe("10");
    });

    it("初期残高が負の場合は InvalidConstructionException", () => {
        // Act
        const error = expectErr(DepositOnlyAccount.open(accountId, "FIXED_TERM", Money.of(-10)));

        // Assert
        expect(error).toBeInstanceOf(InvalidConstructionException);
        expect(error.kind).toBe("FIXED_TERM");
    });
});
