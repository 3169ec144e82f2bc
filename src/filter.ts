import type { GeneratorConfig } from './config.js';
import { type ErrorEntry, qualifiedName } from './types.js';

/**
 * Name that shows up on the page for the boxed trait object impls, never a real error type.
 */
const RESERVED_NAME = 'Box';

const PAGE_EXTENSION = '.html';

export type RejectionReason = 'reserved-name' | 'page-link' | 'empty-package' | 'unstable' | 'generic';

type DenylistConfig = Pick<GeneratorConfig, 'unstableApis' | 'genericErrors'>;

/**
 * Why an entry is excluded from generation, or null when it is kept.
 */
export function rejectionReason(
  entry: Pick<ErrorEntry, 'package' | 'name'>,
  config: DenylistConfig
): RejectionReason | null {
  if (entry.name === RESERVED_NAME) return 'reserved-name';
  if (entry.package.includes(PAGE_EXTENSION)) return 'page-link';
  if (entry.package === '') return 'empty-package';

  const qualified = qualifiedName(entry);
  if (config.unstableApis.includes(qualified)) return 'unstable';
  if (config.genericErrors.includes(qualified)) return 'generic';

  return null;
}

export function isValidError(entry: Pick<ErrorEntry, 'package' | 'name'>, config: DenylistConfig): boolean {
  return rejectionReason(entry, config) === null;
}
