// SPDX-License-Identifier: Apache-2.0

import {type AccountId} from '../../types/index.js';
import {NearAccountId} from './near-account-id.js';

/** Prefix of the account holding the token contract */
export const TOKEN_ACCOUNT_PREFIX: string = 'token';

/** Prefix of the account holding the HTLC contract */
export const HTLC_ACCOUNT_PREFIX: string = 'htlc';

/**
 * The three deployment targets. `main` is the master wallet, the others are its subaccounts.
 */
export interface AccountSet {
  readonly main: AccountId;
  readonly token: AccountId;
  readonly htlc: AccountId;
}

export class AccountDeriver {
  private constructor() {}

  public static subaccountOf(prefix: string, master: AccountId): AccountId {
    return `${prefix}.${master}`;
  }

  /**
   * Derives the account topology from the master wallet. Pure; the prefixes are fixed.
   *
   * Only the wallet is validated here. A derived id can exceed the maximum length for a long wallet, so
   * callers validate it before using it.
   *
   * @throws InvalidAccountReferenceError when the wallet is not a valid account id
   */
  public static derive(walletIdentity: AccountId): AccountSet {
    const main: AccountId = NearAccountId.validate(walletIdentity);
    return {
      main,
      token: AccountDeriver.subaccountOf(TOKEN_ACCOUNT_PREFIX, main),
      htlc: AccountDeriver.subaccountOf(HTLC_ACCOUNT_PREFIX, main),
    };
  }
}
