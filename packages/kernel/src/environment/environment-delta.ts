/**
 * envshift Kernel: Environment Delta
 *
 * An in-memory model of PATH and environment variables. Projection applies
 * and reverses profile environments against a delta instead of the real
 * process environment.
 *
 * A delta is non-durable bookkeeping. Changes made here never reach the
 * user's shell; the generated environment script is the only channel that
 * affects future shell sessions.
 */

/** Readonly view of a process environment. */
export type EnvRecord = Readonly<Record<string, string | undefined>>;

const PATH_VARIABLE = 'PATH';

export class EnvironmentDelta {
  private path: string[];
  private readonly variables: Map<string, string> = new Map();

  /**
   * @param env - Source environment; PATH is split into entries and every
   *   other defined variable is copied
   * @param separator - PATH entry separator (':' on POSIX, ';' on Windows)
   */
  constructor(env: EnvRecord = {}, readonly separator: string = ':') {
    for (const [key, value] of Object.entries(env)) {
      if (value !== undefined && key !== PATH_VARIABLE) {
        this.variables.set(key, value);
      }
    }
    this.path = splitPath(env[PATH_VARIABLE] ?? '', separator);
  }

  // -------------------------------------------------------------------------
  // PATH
  // -------------------------------------------------------------------------

  getPath(): ReadonlyArray<string> {
    return this.path;
  }

  getPathString(): string {
    return this.path.join(this.separator);
  }

  setPath(entries: ReadonlyArray<string>): void {
    this.path = entries.filter((e) => e.length > 0);
  }

  hasPathEntry(entry: string): boolean {
    return this.path.includes(entry);
  }

  /** Remove every entry equal to `entry`. Returns the number removed. */
  removePathEntry(entry: string): number {
    const before = this.path.length;
    this.path = this.path.filter((p) => p !== entry);
    return before - this.path.length;
  }

  // -------------------------------------------------------------------------
  // Variables
  // -------------------------------------------------------------------------

  get(name: string): string | undefined {
    if (name === PATH_VARIABLE) return this.getPathString();
    return this.variables.get(name);
  }

  set(name: string, value: string): void {
    if (name === PATH_VARIABLE) {
      this.path = splitPath(value, this.separator);
      return;
    }
    this.variables.set(name, value);
  }

  unset(name: string): void {
    if (name === PATH_VARIABLE) {
      this.path = [];
      return;
    }
    this.variables.delete(name);
  }

  /** Flatten back into an environment record with PATH joined. */
  toEnv(): Record<string, string> {
    const out: Record<string, string> = Object.fromEntries(this.variables);
    out[PATH_VARIABLE] = this.getPathString();
    return out;
  }
}

function splitPath(value: string, separator: string): string[] {
  return value.split(separator).filter((e) => e.length > 0);
}

// ---------------------------------------------------------------------------
// Path expansion
// ---------------------------------------------------------------------------

const BRACED_VARIABLE = /^\$\{([A-Za-z_][A-Za-z0-9_]*)\}/;
const BARE_VARIABLE = /^\$([A-Za-z_][A-Za-z0-9_]*)/;

/**
 * Expand a leading home or variable reference using values from the delta.
 *
 *   '~' and '~/rest'        -> HOME, HOME + '/rest'
 *   '${NAME}rest'           -> value of NAME + 'rest'
 *   '$NAME/rest'            -> value of NAME + '/rest'
 *
 * A reference to an unset variable is left as written. Only the leading
 * reference is expanded.
 */
export function expandPath(path: string, delta: EnvironmentDelta): string {
  if (path === '~' || path.startsWith('~/')) {
    const home = delta.get('HOME');
    return home === undefined ? path : home + path.slice(1);
  }

  const match = BRACED_VARIABLE.exec(path) ?? BARE_VARIABLE.exec(path);
  if (match === null) return path;

  const [reference, name] = match;
  if (name === undefined) return path;
  const value = delta.get(name);
  return value === undefined ? path : value + path.slice(reference.length);
}
