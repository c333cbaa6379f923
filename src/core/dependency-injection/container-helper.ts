// SPDX-License-Identifier: Apache-2.0

import {container, type InjectionToken} from 'tsyringe-neo';
import {DeployError} from '../errors/deploy-error.js';

/**
 * Returns the injected parameter when the caller supplied one, otherwise resolves it from the container.
 * Lets classes be constructed directly (as the tests do) or through the container.
 *
 * @param parameter - the value passed to the constructor, if any
 * @param token - the token to resolve when the parameter is absent
 * @param callingClassName - used in the error message when the token is not registered
 */
export function patchInject<T>(parameter: T | undefined | null, token: InjectionToken<T>, callingClassName: string): T {
  if (parameter !== undefined && parameter !== null) {
    return parameter;
  }
  if (!container.isRegistered(token, true)) {
    throw new DeployError(`${String(token)} is not registered, required by ${callingClassName}`);
  }
  return container.resolve<T>(token);
}
