// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {NearAccountId} from '../../../../src/business/accounts/near-account-id.js';
import {InvalidAccountReferenceError} from '../../../../src/core/errors/invalid-account-reference-error.js';

describe('NearAccountId', () => {
  describe('isValid', () => {
    for (const value of ['ab', 'alice.testnet', 'token.alice.testnet', 'a-b_c.near', '0x1.near', 'a'.repeat(64)]) {
      it(`should accept '${value.length > 20 ? `${value.slice(0, 8)}...` : value}'`, () => {
        expect(NearAccountId.isValid(value)).to.be.true;
      });
    }

    for (const value of ['a', 'Alice.testnet', 'alice..testnet', '.alice', 'alice.', '-alice', 'alice-', 'a--b', 'a b', 'a'.repeat(65)]) {
      it(`should reject '${value.length > 20 ? `${value.slice(0, 8)}...` : value}'`, () => {
        expect(NearAccountId.isValid(value)).to.be.false;
      });
    }
  });

  describe('validate', () => {
    it('should return a valid account id unchanged', () => {
      expect(NearAccountId.validate('alice.testnet')).to.equal('alice.testnet');
    });

    it('should reject an empty account id', () => {
      expect(() => NearAccountId.validate('')).to.throw(
        InvalidAccountReferenceError,
        "invalid account reference '': account id must not be empty",
      );
    });

    it('should reject an undefined account id', () => {
      expect(() => NearAccountId.validate(undefined)).to.throw(InvalidAccountReferenceError, 'must not be empty');
    });

    it('should reject a blank account id', () => {
      expect(() => NearAccountId.validate('   ')).to.throw(InvalidAccountReferenceError, 'must not be empty');
    });

    it('should reject an account id that is too short', () => {
      expect(() => NearAccountId.validate('a')).to.throw(
        InvalidAccountReferenceError,
        "invalid account reference 'a': account id must be between 2 and 64 characters",
      );
    });

    it('should reject uppercase characters', () => {
      try {
        NearAccountId.validate('Bob.near');
        expect.fail('expected validate to throw');
      } catch (error) {
        expect(error).to.be.instanceOf(InvalidAccountReferenceError);
        if (error instanceof InvalidAccountReferenceError) {
          expect(error.accountId).to.equal('Bob.near');
          expect(error.message).to.equal(
            "invalid account reference 'Bob.near': account id may only contain lowercase letters, digits and single separators (. - _)",
          );
        }
      }
    });
  });
});
