import {describe, expect, it} from "vitest";
import {err, ok} from "../../src/common/result/Result";
import type {Result} from "../../src/common/result/Result";


describe("Result", () => {
    it("Ok は値を保持し、isOk() が true", () => {
        // Arrange
        const result: Result<number, string> = ok(42);

        // Assert
        expect(result.ok).toBe(true);
        expect(result.isOk()).toBe(true);
        expect(result.isErr()).toBe(false);
        if (result.isOk()) {
            expect(result.value).toBe(42);
        }
    });

    it("Err はエラーを保持し、isErr() が true", () => {
        // Arrange
        const result: Result<number, string> = err("boom");

        // Assert
        expect(result.ok).toBe(false);
        expect(result.isErr()).toBe(true);
        if (result.isErr()) {
            expect(result.error).toBe("boom");
        }
    });

    it("map は Ok の値だけを変換する", () => {
        // Arrange
        const success: Result<number, string> = ok(2);
        const failure: Result<number, string> = err("boom");

        // Act & Assert
        expect(success.map((value) => value * 10).unwrapOr(0)).toBe(20);
        expect(failure.map((value) => value * 10).unwrapOr(0)).toBe(0);
    });

    it("mapErr は Err のエラーだけを変換する", () => {
        // Arrange
        const failure: Result<number, string> = err("boom");

        // Act
        const mapped = failure.mapErr((error) => error.length);

        // Assert
        expect(mapped.isErr() && mapped.error).toBe(4);
        expect(ok<number, string>(1).mapErr((error) => error.length).unwrapOr(0)).toBe(1);
    });
});
