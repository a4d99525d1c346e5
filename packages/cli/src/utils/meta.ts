/**
 * JSON meta helper for CLI outputs
 */

import { VERSION } from '@catfreq/core';
import type { CliContext } from './context.js';

export interface MetaBlock {
  tool: {
    name: string;
    version: string;
    execPath: string;
    runtime: string;
  };
  context: {
    cwd: string;
    apiUrl: string;
    cacheDir: string;
    command: string;
    timestamp: string;
  };
}

export function buildMeta(ctx: CliContext, command?: string): MetaBlock {
  return {
    tool: {
      name: 'catfreq',
      version: VERSION,
      execPath: process.execPath,
      runtime: `Node.js ${process.version}`,
    },
    context: {
      cwd: process.cwd(),
      apiUrl: ctx.config.client.apiUrl,
      cacheDir: ctx.config.cacheDir,
      command: command ?? process.argv.join(' '),
      timestamp: new Date().toISOString(),
    },
  };
}

export function withMeta<T extends object>(data: T, meta: MetaBlock): T & { meta: MetaBlock } {
  return { meta, ...data };
}
