import { resolve } from 'node:path';

import { estimateTimeout } from '../../core/timeout/estimator.js';
import { prescan } from '../../core/timeout/prescan.js';
import type { CliContext } from '../context.js';

export interface EstimateCommandOptions {
  path: string;
  exclude: string[];
}

/** Pre-scan `path` and print the signals with the resulting budget. */
export async function runEstimateCommand(ctx: CliContext, opts: EstimateCommandOptions): Promise<number> {
  const path = resolve(ctx.cwd, opts.path);
  const scan = await prescan(path, { timeBoxMs: ctx.config.prescan.timeBoxMs, exclude: opts.exclude });
  if (scan.missing) {
    ctx.renderer.error('Nothing to scan', `${path} does not exist`);
    return 1;
  }
  const estimate = estimateTimeout(scan, ctx.config.timeouts);
  ctx.logger.debug('estimate computed', { path, timeoutMs: estimate.timeoutMs, items: scan.itemCount, bytes: scan.totalBytes });
  ctx.renderer.estimate({ path, scan, estimate });
  return 0;
}
