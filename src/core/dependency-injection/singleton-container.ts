// SPDX-License-Identifier: Apache-2.0

import {type ClassProvider, Lifecycle} from 'tsyringe-neo';

export class SingletonContainer<T = unknown> {
  public readonly lifecycle: Lifecycle = Lifecycle.Singleton;

  public constructor(
    public readonly token: symbol,
    public readonly useClass: ClassProvider<T>['useClass'],
  ) {}
}
