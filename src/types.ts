/**
 * One implementer of the error trait discovered on the docs page.
 */
export interface ErrorEntry {
  /** Module path the type lives in, `::`-delimited (e.g. `std::io`) */
  package: string;

  /** Bare type identifier (e.g. `Error`) */
  name: string;

  /** Raw link target the package was parsed from, kept for diagnostics */
  href: string;
}

/**
 * Fully-qualified type name, used for denylist checks and generated strings.
 */
export function qualifiedName(entry: Pick<ErrorEntry, 'package' | 'name'>): string {
  return `${entry.package}::${entry.name}`;
}

/**
 * A fresh scratch entry. Always assign the returned value; never keep the factory.
 */
export function emptyEntry(): ErrorEntry {
  return { package: '', name: '', href: '' };
}
