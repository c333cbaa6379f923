// SPDX-License-Identifier: Apache-2.0

import {InvalidAccountReferenceError} from '../../core/errors/invalid-account-reference-error.js';
import {type AccountId} from '../../types/index.js';

export class NearAccountId {
  public static readonly MIN_LENGTH: number = 2;
  public static readonly MAX_LENGTH: number = 64;

  /** Lowercase alphanumeric parts joined by `.`, with single `-` or `_` separators inside a part */
  private static readonly PATTERN: RegExp = /^(([\da-z]+[_-])*[\da-z]+\.)*([\da-z]+[_-])*[\da-z]+$/;

  private constructor() {}

  public static isValid(value: string): boolean {
    return (
      value.length >= NearAccountId.MIN_LENGTH &&
      value.length <= NearAccountId.MAX_LENGTH &&
      NearAccountId.PATTERN.test(value)
    );
  }

  /**
   * @returns the account id when it is well formed
   * @throws InvalidAccountReferenceError when it is empty or malformed
   */
  public static validate(value: string | undefined): AccountId {
    if (value === undefined || value.trim() === '') {
      throw new InvalidAccountReferenceError(value ?? '', 'account id must not be empty');
    }
    if (value.length < NearAccountId.MIN_LENGTH || value.length > NearAccountId.MAX_LENGTH) {
      throw new InvalidAccountReferenceError(
        value,
        `account id must be between ${NearAccountId.MIN_LENGTH} and ${NearAccountId.MAX_LENGTH} characters`,
      );
    }
    if (!NearAccountId.PATTERN.test(value)) {
      throw new InvalidAccountReferenceError(
        value,
        'account id may only contain lowercase letters, digits and single separators (. - _)',
      );
    }
    return value;
  }
}
