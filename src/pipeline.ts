import path from 'node:path';
import type { GeneratorConfig } from './config.js';
import { renderSource, writeSource } from './emitter.js';
import { extractErrors } from './extractor.js';
import { fetchDocs } from './fetcher.js';
import { consoleLogger, type Logger } from './logger.js';
import type { ErrorEntry } from './types.js';

/**
 * Collaborators a run can swap out
 */
export interface PipelineDeps {
  /** Fetch implementation (default: global fetch) */
  fetchFn?: typeof fetch;
  logger?: Logger;
  /** Directory outputPath is resolved against (default: process.cwd()) */
  cwd?: string;
}

export interface PipelineResult {
  entries: Readonly<ErrorEntry>[];
  /** Absolute path of the generated file */
  outputPath: string;
  source: string;
  diagnostics: number;
}

/**
 * Fetch -> extract -> emit. Nothing on disk is touched unless the fetch succeeds.
 */
export async function runPipeline(config: GeneratorConfig, deps: PipelineDeps = {}): Promise<PipelineResult> {
  const { fetchFn, logger = consoleLogger, cwd = process.cwd() } = deps;

  const html = await fetchDocs(config.docsUrl, { fetchFn });
  const { entries, rejected, diagnostics } = extractErrors(html, { config, logger });

  if (rejected.length > 0) {
    logger.log(`skipped ${rejected.length} entries (${summarizeRejections(rejected.map(r => r.reason))})`);
  }
  logger.log(`found ${entries.length} valid errors. Beginning code generation to ${config.outputPath}`);

  const outputPath = path.resolve(cwd, config.outputPath);
  const source = renderSource(entries, config);
  await writeSource(outputPath, source);

  return { entries, outputPath, source, diagnostics };
}

function summarizeRejections(reasons: string[]): string {
  const counts = new Map<string, number>();
  for (const reason of reasons) {
    counts.set(reason, (counts.get(reason) ?? 0) + 1);
  }
  return Array.from(counts, ([reason, count]) => `${reason}: ${count}`).join(', ');
}
