// SPDX-License-Identifier: Apache-2.0

import {type Options} from '../../request/options.js';
import {type NearExecutionBuilder} from '../../execution/near-execution-builder.js';
import {CONTRACT_INIT_ARGS, CONTRACT_INIT_METHOD, SEED_PHRASE_HD_PATH} from '../../../../core/constants.js';
import {IllegalArgumentError} from '../../../../core/errors/illegal-argument-error.js';

/**
 * Options for `cargo near deploy` with an initialization call.
 *
 * The keyword tokens are positional in the cargo-near grammar, so they are rendered in a fixed order.
 */
export class DeployWithInitOptions implements Options {
  public constructor(
    public readonly gas: string,
    public readonly deposit: string,
    public readonly network: string,
    public readonly seedPhrase: string,
  ) {
    for (const [name, value] of Object.entries({gas, deposit, network, seedPhrase})) {
      if (!value) {
        throw new IllegalArgumentError(`${name} must not be null`);
      }
    }
  }

  /**
   * Renders everything after the target account.
   */
  public apply(builder: NearExecutionBuilder): void {
    builder
      .positional('with-init-call')
      .positional(CONTRACT_INIT_METHOD)
      .positional('text-args')
      .positional(CONTRACT_INIT_ARGS)
      .positional('prepaid-gas')
      .positional(this.gas)
      .positional('attached-deposit')
      .positional(this.deposit)
      .positional('network-config')
      .positional(this.network)
      .positional('sign-with-seed-phrase')
      .positional(this.seedPhrase, true)
      .argument('seed-phrase-hd-path', SEED_PHRASE_HD_PATH)
      .positional('send');
  }
}
