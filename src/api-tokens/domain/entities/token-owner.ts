/**
 * Who a token acts for, resolved from its user at verification time.
 */
export type TokenOwner =
  | { kind: 'agent'; isAdmin: boolean }
  | { kind: 'customer'; customerLogin: string; customerCompanyId?: string };
