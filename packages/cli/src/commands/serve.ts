/**
 * serve command - Run the HTTP query server
 */

import { parseNonNegativeInt } from '@catfreq/core';
import { startServer } from '@catfreq/server';
import { createContext } from '../utils/context.js';
import { printError } from '../utils/format.js';

export interface ServeOptions {
  port?: string;
}

export async function serveCommand(options: ServeOptions): Promise<void> {
  try {
    const ctx = createContext();
    const port = parseNonNegativeInt(options.port, '--port', ctx.config.port);
    await startServer({ ...ctx.config, port }, ctx.pipeline);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    printError(message);
    process.exit(1);
  }
}
