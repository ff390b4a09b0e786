function escapeRegExp(value: string): string {
  return value.replace(/[.+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a path pattern where `*` matches any run of characters.
 * Patterns without a wildcard match as prefixes (`/docs` matches `/docs/intro`).
 */
export function compilePathPattern(pattern: string): RegExp {
  const body = pattern.split('*').map(escapeRegExp).join('.*');
  return pattern.includes('*') ? new RegExp(`^${body}$`) : new RegExp(`^${body}`);
}

export class PathFilter {
  private readonly include: RegExp[];
  private readonly exclude: RegExp[];

  constructor(includePaths: string[] = [], excludePaths: string[] = []) {
    this.include = includePaths.map(compilePathPattern);
    this.exclude = excludePaths.map(compilePathPattern);
  }

  allows(url: string): boolean {
    let pathname: string;
    try {
      pathname = new URL(url).pathname;
    } catch {
      return false;
    }

    if (this.exclude.some((pattern) => pattern.test(pathname))) {
      return false;
    }
    if (this.include.length === 0) {
      return true;
    }
    return this.include.some((pattern) => pattern.test(pathname));
  }
}
