// SPDX-License-Identifier: Apache-2.0

import {type Version} from './src/types/index.js';
import {fileURLToPath} from 'node:url';
import path from 'node:path';
import fs from 'node:fs';

/**
 * This file should only contain the function to get the near-deploy version.
 */
export function getDeployerVersion(): Version {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  const __filename: string = fileURLToPath(import.meta.url);
  const __dirname: string = path.dirname(__filename);

  // sources sit beside package.json, the compiled output one level below it
  const packageJsonPath: string =
    [path.resolve(__dirname, 'package.json'), path.resolve(__dirname, '..', 'package.json')].find(
      (candidate): boolean => fs.existsSync(candidate),
    ) ?? path.resolve(__dirname, 'package.json');
  const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
    return String(packageJson.version);
  }
  return '0.0.0';
}
