/**
 * Generator configuration.
 *
 * Everything the run depends on is a fixed value here; there are no flags or
 * environment variables. Tests build variations with resolveConfig().
 */

export interface GeneratorConfig {
  /** Docs page listing the implementers of the error trait */
  docsUrl: string;
  /** Generated file, relative to the working directory */
  outputPath: string;
  /** Qualified names of unstable APIs to skip */
  unstableApis: readonly string[];
  /** Qualified names of errors that need generic parameters */
  genericErrors: readonly string[];
  /** Extension trait implemented for every error */
  extensionTrait: string;
  /** Method on the extension trait returning the qualified name */
  extensionMethod: string;
  /** Wrapper error every error converts into */
  wrapperError: string;
}

export const DEFAULT_CONFIG: Readonly<GeneratorConfig> = Object.freeze({
  docsUrl: 'https://doc.rust-lang.org/std/error/trait.Error.html',
  outputPath: './src/error_ext_impl.rs',
  unstableApis: [
    'std::alloc::AllocErr',
    'std::alloc::CannotReallocInPlace',
    'std::char::CharTryFromError',
    'std::num::TryFromIntError'
  ],
  genericErrors: [
    'std::sync::TryLockError',
    'std::sync::PoisonError',
    'std::sync::mpsc::TrySendError',
    'std::sync::mpsc::SendError',
    'std::io::IntoInnerError'
  ],
  extensionTrait: 'LambdaErrorExt',
  extensionMethod: 'error_type',
  wrapperError: 'HandlerError'
});

/**
 * Merge partial overrides onto the defaults.
 */
export function resolveConfig(overrides: Partial<GeneratorConfig> = {}): GeneratorConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}
