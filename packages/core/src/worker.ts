/**
 * Rescale worker body, shared by the piston-rescale CLI and its tests
 */

import { formatEvent, type EventSink } from './events.js';
import { rescaleMesh } from './meshRescaler.js';

export interface WorkerIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: WorkerIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Run one rescale for `piston-rescale <scalar-config-file>`.
 *
 * @returns the process exit code: 0 on success, 1 otherwise
 */
export async function runRescaleWorker(args: readonly string[], io: WorkerIO = consoleIO): Promise<number> {
  if (args.length !== 1) {
    io.err('Usage: piston-rescale <scalar-config-file>');
    return 1;
  }

  const sink: EventSink = {
    emit: (event) => {
      if (event.level !== 'info') {
        io.err(formatEvent(event));
      }
    },
  };

  const outcome = await rescaleMesh(args[0], { sink });
  if (outcome.success) {
    io.out(`Rescaled ${outcome.nodesTransformed} node(s) into ${outcome.destination}`);
    return 0;
  }
  return 1;
}
