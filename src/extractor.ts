import { Parser } from 'htmlparser2';
import type { GeneratorConfig } from './config.js';
import { type RejectionReason, rejectionReason } from './filter.js';
import { consoleLogger, type Logger } from './logger.js';
import { type ErrorEntry, emptyEntry } from './types.js';

/**
 * Text nodes that precede each implementer link on the docs page.
 * The spaced variants appear where "impl" sits in its own element.
 */
export const MARKER_PHRASES: readonly string[] = [' Error for ', 'Error for ', 'impl Error for '];

const PARENT_SEGMENT = '..';

export type ExtractorState = 'idle' | 'recording';

/**
 * A candidate dropped by the filter
 */
export interface RejectedEntry {
  entry: Readonly<ErrorEntry>;
  reason: RejectionReason;
}

/**
 * Result of one pass over the docs markup
 */
export interface ExtractResult {
  /** Entries that passed the filter, in page order */
  entries: Readonly<ErrorEntry>[];
  /** Candidates the filter excluded, in page order */
  rejected: RejectedEntry[];
  /** Number of malformed regions (marker seen while already recording) */
  diagnostics: number;
}

export interface ExtractOptions {
  config: Pick<GeneratorConfig, 'unstableApis' | 'genericErrors'>;
  logger?: Logger;
}

/**
 * Choose the attribute holding the link target.
 * Falls back to position when there is no href: the second of exactly two, else the first.
 */
export function pickHref(attribs: Record<string, string>): string {
  if (attribs.href !== undefined) {
    return attribs.href;
  }
  const values = Object.values(attribs);
  if (values.length === 2) {
    return values[1];
  }
  return values[0] ?? '';
}

/**
 * Turn a relative doc link into a module path.
 *   ../../std/io/struct.Error.html -> std::io
 */
export function packageFromHref(href: string): string {
  const parts = href.split('/');
  let pkg = '';

  for (let i = 0; i < parts.length; i++) {
    const part = parts[i];
    if (part === PARENT_SEGMENT) continue;
    // Last segment is the page itself
    if (i === parts.length - 1) break;
    pkg += `${part}::`;
  }

  return pkg.endsWith('::') ? pkg.slice(0, -2) : pkg;
}

/**
 * State machine fed with link and text events from the tokenizer.
 *
 * idle --marker--> recording --text--> idle
 *
 * While recording, a link sets the scratch entry's package and the next text
 * sets its name, at which point the entry is filtered and, if kept, frozen
 * into the result.
 */
export class ErrorDocsExtractor {
  private state: ExtractorState = 'idle';
  private current: ErrorEntry = emptyEntry();
  private readonly entries: Readonly<ErrorEntry>[] = [];
  private readonly rejected: RejectedEntry[] = [];
  private diagnostics = 0;
  private readonly logger: Logger;

  constructor(private readonly config: ExtractOptions['config'], logger: Logger = consoleLogger) {
    this.logger = logger;
  }

  get currentState(): ExtractorState {
    return this.state;
  }

  handleLinkStart(attribs: Record<string, string>): void {
    if (this.state !== 'recording') return;

    const href = pickHref(attribs);
    this.current.package = packageFromHref(href);
    this.current.href = href;
  }

  handleText(text: string): void {
    if (MARKER_PHRASES.includes(text)) {
      this.startRecording();
      return;
    }
    if (this.state !== 'recording') return;

    this.current.name = text;
    const reason = rejectionReason(this.current, this.config);
    const snapshot = Object.freeze({ ...this.current });
    if (reason === null) {
      this.entries.push(snapshot);
    } else {
      this.rejected.push({ entry: snapshot, reason });
    }

    this.current = emptyEntry();
    this.state = 'idle';
  }

  result(): ExtractResult {
    return {
      entries: [...this.entries],
      rejected: [...this.rejected],
      diagnostics: this.diagnostics
    };
  }

  private startRecording(): void {
    if (this.state === 'recording') {
      this.diagnostics++;
      this.logger.warn(
        `Marker found while still recording an entry (package '${this.current.package}', href '${this.current.href}'); discarding it`
      );
    }
    this.state = 'recording';
    this.current = emptyEntry();
  }
}

/**
 * Stream the markup through htmlparser2 and collect the implementers.
 *
 * htmlparser2 can split one text node over several ontext calls, so text is
 * buffered and handed over whole at the next tag boundary.
 */
export function extractErrors(html: string, options: ExtractOptions): ExtractResult {
  const extractor = new ErrorDocsExtractor(options.config, options.logger);
  let pendingText: string | null = null;

  const flushText = (): void => {
    if (pendingText !== null) {
      const text = pendingText;
      pendingText = null;
      extractor.handleText(text);
    }
  };

  const parser = new Parser({
    onopentag(name, attribs) {
      flushText();
      if (name === 'a') {
        extractor.handleLinkStart(attribs);
      }
    },
    onclosetag() {
      flushText();
    },
    oncomment() {
      flushText();
    },
    ontext(text) {
      pendingText = (pendingText ?? '') + text;
    },
    onend() {
      flushText();
    }
  });

  parser.write(html);
  parser.end();

  return extractor.result();
}
