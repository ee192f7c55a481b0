/**
 * アカウントが提供する操作の組み合わせ（ケイパビリティ）
 *
 * - DEPOSIT_ONLY: 入金のみ
 * - DEPOSIT_WITHDRAW: 入金と出金
 *
 * 生成時に決まり、以後変わることはない。
 */
export type Capability = 'DEPOSIT_ONLY' | 'DEPOSIT_WITHDRAW';

/**
 * アカウント種別ごとの表示名とケイパビリティ
 */
export const ACCOUNT_KINDS = {
    SAVINGS: {label: 'Savings Account', capability: 'DEPOSIT_WITHDRAW'},
    CURRENT: {label: 'Current Account', capability: 'DEPOSIT_WITHDRAW'},
    FIXED_TERM: {label: 'Fixed Term Account', capability: 'DEPOSIT_ONLY'},
} as const satisfies Record<string, { label: string; capability: Capability }>;

export type AccountKind = keyof typeof ACCOUNT_KINDS;

/**
 * 出金できる種別（SAVINGS | CURRENT）
 */
export type WithdrawableKind = {
    [K in AccountKind]: (typeof ACCOUNT_KINDS)[K]['capability'] extends 'DEPOSIT_WITHDRAW' ? K : never
}[AccountKind];

/**
 * 入金のみの種別（FIXED_TERM）
 */
export type DepositOnlyKind = Exclude<AccountKind, WithdrawableKind>;

export function labelOf(kind: AccountKind): string {
    return ACCOUNT_KINDS[kind].label;
}

export function capabilityOf(kind: AccountKind): Capability {
    return ACCOUNT_KINDS[kind].capability;
}
