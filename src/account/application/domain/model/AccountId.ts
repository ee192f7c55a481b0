/**
 * アカウントID（値オブジェクト）
 */
export class AccountId {
    constructor(private readonly value: bigint) {
    }

    getValue(): bigint {
        return this.value;
    }

    equals(other: AccountId): boolean {
        return this.value === other.value;
    }

    toString(): string {
        return this.value.toString();
    }
}
