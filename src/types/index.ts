/**
 * Core Type Definitions for pyenv-locator
 */

// ─────────────────────────────────────────────────────────────
// Environment Types
// ─────────────────────────────────────────────────────────────

/** Supported platform identifiers */
export type Platform = 'darwin' | 'linux' | 'win32';

/** Tools that manage Python environments */
export type EnvManagerType = 'Pyenv';

/**
 * The tool that manages a set of discovered environments.
 * One value is shared by every record produced in a single run.
 */
export interface EnvironmentManager {
  readonly executablePath: string;
  /** Declared tool version; pyenv never reports one */
  readonly version: string | null;
  readonly tool: EnvManagerType;
}

export type PythonEnvironmentCategory = 'PyenvPure' | 'PyenvVirtualEnv';

/**
 * A single discovered Python interpreter
 */
export interface PythonEnvironment {
  /** Folder name for virtual environments, null for plain installs */
  name: string | null;
  /** Interpreter executable; also the dedup key */
  pythonExecutablePath: string;
  category: PythonEnvironmentCategory;
  version: string | null;
  /** Version directory under `<root>/versions` */
  envPath: string;
  /** Same as envPath for pyenv installs */
  sysPrefixPath: string;
  envManager: EnvironmentManager | null;
  /** Always `[pythonExecutablePath]` */
  pythonRunCommand: string[];
}

/**
 * Parsed contents of a pyvenv.cfg file
 */
export interface PyvenvConfig {
  version: string;
  home: string | null;
  includeSystemSitePackages: boolean;
  prompt: string | null;
}

/**
 * A candidate interpreter offered to locators for incremental tracking
 */
export interface PythonEnv {
  executable: string;
  path: string | null;
  version: string | null;
}

// ─────────────────────────────────────────────────────────────
// Host & Reporting
// ─────────────────────────────────────────────────────────────

/**
 * Read-only view of the host machine used during discovery
 */
export interface HostEnvironment {
  platform: Platform;
  /** Returns null for unset or empty variables */
  getEnvVar(name: string): string | null;
  getUserHome(): string | null;
  /** Directories searched for global tool binaries, in priority order */
  getKnownGlobalSearchLocations(): string[];
}

/**
 * Sink receiving discovery results
 */
export interface Reporter {
  reportEnvironmentManager(manager: EnvironmentManager): void;
  reportEnvironment(env: PythonEnvironment): void;
}

// ─────────────────────────────────────────────────────────────
// Locator Types
// ─────────────────────────────────────────────────────────────

/**
 * A discovery strategy for one source of Python installations
 */
export interface Locator {
  /** Unique identifier (e.g. 'pyenv') */
  name: string;
  /** Human-readable name */
  displayName: string;
  isKnown(executable: string): boolean;
  trackIfCompatible(env: PythonEnv): boolean;
  /** Bulk discovery pass; null when nothing could be scanned */
  gather(): true | null;
  report(reporter: Reporter): void;
}

/** Outcome of one locator's gather pass */
export type GatherResults = Record<string, boolean>;

// ─────────────────────────────────────────────────────────────
// UI Types
// ─────────────────────────────────────────────────────────────

export type ColorName =
  | 'reset'
  | 'bright'
  | 'dim'
  | 'red'
  | 'green'
  | 'yellow'
  | 'blue'
  | 'magenta'
  | 'cyan'
  | 'white';
