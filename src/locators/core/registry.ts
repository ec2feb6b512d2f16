/**
 * Locator Registry
 *
 * Holds the active locators, runs their gather passes and forwards
 * their results to a reporter.
 */

import { createLogger } from '../../logger.js';
import type { GatherResults, Locator, Reporter } from '../../types/index.js';

const log = createLogger('registry');

const REQUIRED_METHODS = ['isKnown', 'trackIfCompatible', 'gather', 'report'] as const;

export class LocatorRegistry {
  locators: Locator[];

  constructor() {
    this.locators = [];
  }

  /**
   * Register a new locator
   *
   * @throws {Error} If the locator is invalid or its name is taken
   */
  register(locator: Locator): LocatorRegistry {
    const error = this.validate(locator);
    if (error) {
      throw new Error(`Invalid locator '${locator.name || 'unknown'}': ${error}`);
    }

    if (this.locators.some((l) => l.name === locator.name)) {
      throw new Error(`Locator '${locator.name}' is already registered`);
    }

    this.locators.push(locator);
    return this;
  }

  registerAll(locators: Locator[]): LocatorRegistry {
    for (const locator of locators) {
      this.register(locator);
    }
    return this;
  }

  validate(locator: Partial<Locator>): string | null {
    if (!locator.name || typeof locator.name !== 'string') {
      return 'Missing or invalid "name" property';
    }

    if (!locator.displayName || typeof locator.displayName !== 'string') {
      return 'Missing or invalid "displayName" property';
    }

    for (const method of REQUIRED_METHODS) {
      if (typeof locator[method] !== 'function') {
        return `Missing or invalid "${method}" function`;
      }
    }

    return null;
  }

  /**
   * Run every locator's gather pass.
   * A locator that throws is logged and recorded as having found nothing.
   */
  gatherAll(): GatherResults {
    const results: GatherResults = {};

    for (const locator of this.locators) {
      try {
        results[locator.name] = locator.gather() !== null;
      } catch (err) {
        log.error(`Locator '${locator.name}' failed: ${err instanceof Error ? err.message : String(err)}`);
        results[locator.name] = false;
      }
    }

    return results;
  }

  reportAll(reporter: Reporter): void {
    for (const locator of this.locators) {
      locator.report(reporter);
    }
  }

  /**
   * Whether any registered locator already knows this executable
   */
  isKnown(executable: string): boolean {
    return this.locators.some((l) => l.isKnown(executable));
  }

  get count(): number {
    return this.locators.length;
  }
}
