/**
 * Command line options of the one-shot drain.
 *
 * Usage:
 *   node dist/drain.js
 *   node dist/drain.js --max-iterations 500
 */

import { ok, err, type Result } from 'neverthrow';

import type { DrainDeliveryQueueOptions } from '../../core/usecases/drain-delivery-queue.js';

export function parseDrainArgs(args: readonly string[]): Result<DrainDeliveryQueueOptions, string> {
  const options: DrainDeliveryQueueOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--max-iterations': {
        const value = Number(nextArg);
        if (nextArg === undefined || !Number.isInteger(value) || value < 1) {
          return err('--max-iterations needs a positive integer');
        }
        options.maxIterations = value;
        i++;
        break;
      }
      default:
        return err(`Unknown argument: ${String(arg)}`);
    }
  }

  return ok(options);
}
