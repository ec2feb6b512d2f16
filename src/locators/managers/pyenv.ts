/**
 * pyenv Locator
 *
 * Discovers Python installations and pyenv-virtualenv environments
 * managed by pyenv.
 * https://github.com/pyenv/pyenv
 * https://github.com/pyenv-win/pyenv-win
 */

import path from 'node:path';
import { findAndParsePyvenvConfig, findPythonBinaryPath } from '../core/helpers.js';
import { listSubdirPaths, pathExists } from '../../utils.js';
import { createLogger } from '../../logger.js';
import type {
  EnvironmentManager,
  HostEnvironment,
  Locator,
  PythonEnv,
  PythonEnvironment,
  PyvenvConfig,
  Reporter,
} from '../../types/index.js';

const log = createLogger('pyenv');

/**
 * Collaborators the locator delegates to; overridable in tests
 */
export interface PyenvLocatorOptions {
  findPythonBinary?: (dir: string) => string | null;
  parsePyvenvConfig?: (executable: string) => PyvenvConfig | null;
}

type ResolvedOptions = Required<PyenvLocatorOptions>;

// ─────────────────────────────────────────────────────────────
// Root & manager resolution
// ─────────────────────────────────────────────────────────────

/**
 * Resolve pyenv's installation root: PYENV_ROOT, then PYENV (pyenv-win),
 * then the per-platform default under the home directory.
 * The result is a candidate; it may not exist.
 */
export function resolvePyenvRoot(host: HostEnvironment): string | null {
  const fromEnv = host.getEnvVar('PYENV_ROOT') ?? host.getEnvVar('PYENV');
  if (fromEnv) {
    return fromEnv;
  }

  const home = host.getUserHome();
  if (!home) {
    return null;
  }

  return host.platform === 'win32'
    ? path.join(home, '.pyenv', 'pyenv-win')
    : path.join(home, '.pyenv');
}

/**
 * Locate the pyenv executable: `<root>/bin/pyenv`, else the first
 * `pyenv` found in the host's known search locations.
 */
export function resolvePyenvBinary(host: HostEnvironment): string | null {
  const root = resolvePyenvRoot(host);
  if (!root) {
    return null;
  }

  const exe = path.join(root, 'bin', 'pyenv');
  if (pathExists(exe)) {
    return exe;
  }

  for (const dir of host.getKnownGlobalSearchLocations()) {
    const candidate = path.join(dir, 'pyenv');
    if (pathExists(candidate)) {
      return candidate;
    }
  }

  return null;
}

export function createPyenvManager(executablePath: string): EnvironmentManager {
  return Object.freeze({ executablePath, version: null, tool: 'Pyenv' as const });
}

// ─────────────────────────────────────────────────────────────
// Version classification
// ─────────────────────────────────────────────────────────────

interface VersionRule {
  kind: 'stable' | 'dev' | 'prerelease';
  pattern: RegExp;
}

// Order matters: the first matching rule wins.
const VERSION_RULES: readonly VersionRule[] = [
  // 3.10.10
  { kind: 'stable', pattern: /^(\d+\.\d+\.\d+)$/ },
  // 3.10-dev
  { kind: 'dev', pattern: /^(\d+\.\d+-dev)$/ },
  // 3.10.0a3, 3.13.0b1 (single letter; only the start is anchored)
  { kind: 'prerelease', pattern: /^(\d+\.\d+.\d+\w\d+)/ },
];

export interface VersionMatch {
  kind: VersionRule['kind'];
  version: string;
}

export function matchPyenvVersion(folderName: string): VersionMatch | null {
  for (const rule of VERSION_RULES) {
    const match = rule.pattern.exec(folderName);
    if (match) {
      return { kind: rule.kind, version: match[1] };
    }
  }
  return null;
}

/**
 * Extract the Python version from a pyenv version folder name
 */
export function getPyenvVersion(folderName: string): string | null {
  return matchPyenvVersion(folderName)?.version ?? null;
}

// ─────────────────────────────────────────────────────────────
// Environment building
// ─────────────────────────────────────────────────────────────

export function getPurePythonEnvironment(
  executable: string,
  dir: string,
  manager: EnvironmentManager | null
): PythonEnvironment | null {
  const version = getPyenvVersion(path.basename(dir));
  if (!version) {
    return null;
  }

  return {
    name: null,
    pythonExecutablePath: executable,
    category: 'PyenvPure',
    version,
    envPath: dir,
    sysPrefixPath: dir,
    envManager: manager,
    pythonRunCommand: [executable],
  };
}

export function getVirtualEnvEnvironment(
  executable: string,
  dir: string,
  manager: EnvironmentManager | null,
  parseConfig: (executable: string) => PyvenvConfig | null = findAndParsePyvenvConfig
): PythonEnvironment | null {
  const config = parseConfig(executable);
  if (!config) {
    return null;
  }

  return {
    name: path.basename(dir),
    pythonExecutablePath: executable,
    category: 'PyenvVirtualEnv',
    version: config.version,
    envPath: dir,
    sysPrefixPath: dir,
    envManager: manager,
    pythonRunCommand: [executable],
  };
}

/**
 * List every environment under `<root>/versions`.
 *
 * Returns null when the root cannot be resolved or the versions
 * directory cannot be read.
 */
export function listPyenvEnvironments(
  manager: EnvironmentManager | null,
  host: HostEnvironment,
  options: PyenvLocatorOptions = {}
): PythonEnvironment[] | null {
  const { findPythonBinary, parsePyvenvConfig } = resolveOptions(host, options);

  const root = resolvePyenvRoot(host);
  if (!root) {
    log.debug('No pyenv root could be resolved');
    return null;
  }

  const versionsDir = path.join(root, 'versions');
  const dirs = listSubdirPaths(versionsDir);
  if (!dirs) {
    log.debug(`No versions directory at ${versionsDir}`);
    return null;
  }

  const envs: PythonEnvironment[] = [];
  for (const dir of dirs) {
    const executable = findPythonBinary(dir);
    if (!executable) {
      log.debug(`No interpreter in ${dir}`);
      continue;
    }

    const env =
      getPurePythonEnvironment(executable, dir, manager) ??
      getVirtualEnvEnvironment(executable, dir, manager, parsePyvenvConfig);

    if (env) {
      envs.push(env);
    } else {
      log.debug(`Skipping unrecognized version folder ${dir}`);
    }
  }

  return envs;
}

function resolveOptions(host: HostEnvironment, options: PyenvLocatorOptions): ResolvedOptions {
  return {
    findPythonBinary: options.findPythonBinary ?? ((dir) => findPythonBinaryPath(dir, host.platform)),
    parsePyvenvConfig: options.parsePyvenvConfig ?? findAndParsePyvenvConfig,
  };
}

// ─────────────────────────────────────────────────────────────
// Locator
// ─────────────────────────────────────────────────────────────

export class PyenvLocator implements Locator {
  readonly name = 'pyenv';
  readonly displayName = 'pyenv';

  /** Discovered environments keyed by executable path */
  private readonly discovered = new Map<string, PythonEnvironment>();
  private currentManager: EnvironmentManager | null = null;

  private readonly host: HostEnvironment;
  private readonly options: PyenvLocatorOptions;

  constructor(host: HostEnvironment, options: PyenvLocatorOptions = {}) {
    this.host = host;
    this.options = options;
  }

  get environments(): ReadonlyMap<string, PythonEnvironment> {
    return this.discovered;
  }

  get manager(): EnvironmentManager | null {
    return this.currentManager;
  }

  isKnown(executable: string): boolean {
    return this.discovered.has(executable);
  }

  /**
   * pyenv environments are only discovered in bulk by gather()
   */
  trackIfCompatible(_env: PythonEnv): boolean {
    return false;
  }

  gather(): true | null {
    const binary = resolvePyenvBinary(this.host);
    this.currentManager = binary ? createPyenvManager(binary) : null;
    log.debug(binary ? `Found pyenv at ${binary}` : 'pyenv executable not found');

    const envs = listPyenvEnvironments(this.currentManager, this.host, this.options);
    if (!envs) {
      return null;
    }

    for (const env of envs) {
      // Same executable reached twice: the later entry replaces the earlier one
      this.discovered.set(env.pythonExecutablePath, env);
    }
    log.debug(`Discovered ${this.discovered.size} pyenv environment(s)`);
    return true;
  }

  report(reporter: Reporter): void {
    if (this.currentManager) {
      reporter.reportEnvironmentManager(this.currentManager);
    }
    for (const env of this.discovered.values()) {
      reporter.reportEnvironment(env);
    }
  }
}
