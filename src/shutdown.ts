import type { NoteStore } from './types';

export interface Closable {
  close(callback?: (err?: Error) => void): unknown;
}

export interface ShutdownDependencies {
  server: Closable;
  store: NoteStore;
  exit?: (code: number) => void;
}

/**
 * Build the signal handler that stops accepting requests, closes the store
 * and exits. Signals after the first are ignored.
 */
export function createShutdownHandler(deps: ShutdownDependencies): (signal: string) => void {
  const { server, store, exit = (code: number) => process.exit(code) } = deps;
  let closing = false;

  return (signal: string): void => {
    if (closing) return;
    closing = true;
    console.log(`Shutting down notes (${signal})`);
    server.close((err) => {
      if (err) {
        console.error('Failed to close HTTP server:', err);
      }
      store
        .close()
        .then(() => exit(0))
        .catch((closeErr: unknown) => {
          console.error('Failed to close note store:', closeErr);
          exit(1);
        });
    });
  };
}
