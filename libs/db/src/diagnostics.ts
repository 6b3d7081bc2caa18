/** Log sink passed into framework-free code. A Nest `Logger` satisfies it. */
export interface Diagnostics {
  log(message: string): void;
  warn(message: string): void;
  error(message: string, stack?: string): void;
}

export const silentDiagnostics: Diagnostics = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
