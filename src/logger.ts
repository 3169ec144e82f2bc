/**
 * The subset of console the generator writes to. Tests pass a recorder.
 */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export const consoleLogger: Logger = console;
