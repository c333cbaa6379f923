// SPDX-License-Identifier: Apache-2.0

import {type NearExecutionBuilder} from '../execution/near-execution-builder.js';

/**
 * A request whose parameters can be applied to a NearExecutionBuilder.
 */
export interface NearRequest {
  /**
   * Applies this request's parameters to the given builder.
   * @param builder The builder to apply the parameters to
   */
  apply(builder: NearExecutionBuilder): void;
}
