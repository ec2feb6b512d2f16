/**
 * Python Environment Locators
 *
 * Central entry point: builds the registry for a host, runs discovery
 * and collects the reported results.
 */

import { createHostEnvironment } from '../host.js';
import { CollectingReporter } from '../messaging/index.js';
import { createLocators } from './managers/index.js';
import { LocatorRegistry } from './core/registry.js';
import { compareVersions } from './core/helpers.js';
import type {
  EnvironmentManager,
  GatherResults,
  HostEnvironment,
  PythonEnvironment,
} from '../types/index.js';

export interface ScanResults {
  gathered: GatherResults;
  managers: EnvironmentManager[];
  /** Sorted newest version first */
  environments: PythonEnvironment[];
}

export function createRegistry(host: HostEnvironment = createHostEnvironment()): LocatorRegistry {
  return new LocatorRegistry().registerAll(createLocators(host));
}

/**
 * Gather with every locator and collect what they report
 */
export function scanAll(registry: LocatorRegistry = createRegistry()): ScanResults {
  const gathered = registry.gatherAll();
  const reporter = new CollectingReporter();
  registry.reportAll(reporter);

  const environments = [...reporter.environments].sort(
    (a, b) =>
      compareVersions(a.version, b.version) ||
      a.pythonExecutablePath.localeCompare(b.pythonExecutablePath)
  );

  return { gathered, managers: reporter.managers, environments };
}

export { LocatorRegistry };
export * from './managers/index.js';
