/**
 * Locator Index
 *
 * Builds every locator for a host, in registration order.
 */

import { PyenvLocator } from './pyenv.js';
import type { HostEnvironment, Locator } from '../../types/index.js';

export { PyenvLocator };
export {
  resolvePyenvRoot,
  resolvePyenvBinary,
  createPyenvManager,
  getPyenvVersion,
  matchPyenvVersion,
  getPurePythonEnvironment,
  getVirtualEnvEnvironment,
  listPyenvEnvironments,
} from './pyenv.js';
export type { PyenvLocatorOptions, VersionMatch } from './pyenv.js';

export function createLocators(host: HostEnvironment): Locator[] {
  return [new PyenvLocator(host)];
}
