import fs, { type Stats } from 'fs-extra';
import type { GeneratorConfig } from './config.js';
import { OutputPathError } from './errors.js';
import { type ErrorEntry, qualifiedName } from './types.js';

type TemplateConfig = Pick<GeneratorConfig, 'extensionTrait' | 'extensionMethod' | 'wrapperError'>;

function header(config: TemplateConfig): string {
  return `// Generated code, DO NOT MODIFY!
// This file contains the implementation of the ${config.extensionTrait}
// trait for most of the standard library errors as well as the
// implementation of the From trait for the ${config.wrapperError} struct
// to support the same standard library errors.

`;
}

function useStatement(entry: ErrorEntry): string {
  return `use ${entry.package}::${entry.name};\n`;
}

function extensionImpl(entry: ErrorEntry, config: TemplateConfig): string {
  return `impl ${config.extensionTrait} for ${entry.name} {
    fn ${config.extensionMethod}(&self) -> &str {
        "${qualifiedName(entry)}"
    }
}
`;
}

function conversionImpl(entry: ErrorEntry, config: TemplateConfig): string {
  return `impl From<${entry.name}> for ${config.wrapperError} {
    fn from(e: ${entry.name}) -> Self {
        ${config.wrapperError}::new(e)
    }
}
`;
}

/**
 * Render the generated source. Pure; the same entries always give the same text.
 *
 * Layout: header, one `use` per entry, the crate import, then every extension
 * impl followed by every conversion impl.
 */
export function renderSource(entries: readonly ErrorEntry[], config: TemplateConfig): string {
  const sections: string[] = [header(config)];

  for (const entry of entries) {
    sections.push(useStatement(entry));
  }
  sections.push(`use crate::{${config.extensionTrait}, ${config.wrapperError}};\n\n`);

  for (const entry of entries) {
    sections.push(extensionImpl(entry, config));
  }
  for (const entry of entries) {
    sections.push(conversionImpl(entry, config));
  }

  return sections.join('');
}

async function statIfExists(filePath: string): Promise<Stats | null> {
  try {
    return await fs.stat(filePath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}

/**
 * Replace the file at outputPath with source. Not atomic.
 * Throws OutputPathError, leaving it untouched, when outputPath is not a regular file.
 */
export async function writeSource(outputPath: string, source: string): Promise<void> {
  const existing = await statIfExists(outputPath);
  if (existing) {
    if (!existing.isFile()) {
      throw new OutputPathError(outputPath);
    }
    await fs.remove(outputPath);
  }
  await fs.outputFile(outputPath, source, 'utf-8');
}
