import type { IncomingMessage } from 'http';

// pino-http assigns `req.id` before any route runs.
export const requestIdOf = (req: IncomingMessage): string | undefined =>
  req.id === undefined ? undefined : String(req.id);
