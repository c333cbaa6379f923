// SPDX-License-Identifier: Apache-2.0

import {DeployWithInitOptions} from './deploy-with-init-options.js';
import {type ResolvedConfig} from '../../../../data/configuration/model/deploy-config.js';

export class DeployWithInitOptionsBuilder {
  private _gas: string = '';
  private _deposit: string = '';
  private _network: string = '';
  private _seedPhrase: string = '';

  private constructor() {}

  /**
   * Seeds the builder with the gas, deposit, network and signing seed of a resolved configuration.
   */
  public static fromConfig(config: ResolvedConfig): DeployWithInitOptionsBuilder {
    return new DeployWithInitOptionsBuilder()
      .gas(config.gasBudget)
      .deposit(config.depositAmount)
      .network(config.network)
      .seedPhrase(config.seedCredential);
  }

  public gas(gas: string): DeployWithInitOptionsBuilder {
    this._gas = gas;
    return this;
  }

  public deposit(deposit: string): DeployWithInitOptionsBuilder {
    this._deposit = deposit;
    return this;
  }

  public network(network: string): DeployWithInitOptionsBuilder {
    this._network = network;
    return this;
  }

  public seedPhrase(seedPhrase: string): DeployWithInitOptionsBuilder {
    this._seedPhrase = seedPhrase;
    return this;
  }

  public build(): DeployWithInitOptions {
    return new DeployWithInitOptions(this._gas, this._deposit, this._network, this._seedPhrase);
  }
}
