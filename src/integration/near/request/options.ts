// SPDX-License-Identifier: Apache-2.0

import {type NearExecutionBuilder} from '../execution/near-execution-builder.js';

export interface Options {
  apply(builder: NearExecutionBuilder): void;
}
