import { closeSync, openSync, writeSync } from 'fs';
import { Logger } from '@nestjs/common';

export interface LineWriter {
  write(line: string): void;
  /** False once the destination stopped accepting output. */
  isOpen(): boolean;
  close(): void;
}

const logger = new Logger('LineWriter');

/**
 * Writes to `stream` until it fails. A closed pipe (`EPIPE`, e.g. `| head`)
 * ends output quietly; any other stream error is logged and sets exit code 1.
 */
export function streamWriter(stream: NodeJS.WritableStream): LineWriter {
  let open = true;

  const onError = (error: NodeJS.ErrnoException) => {
    if (!open) return;
    open = false;
    if (error.code === 'EPIPE') return;
    logger.error(`Output stream failed: ${error.message}`);
    process.exitCode = 1;
  };
  stream.on('error', onError);

  return {
    write: (line) => {
      if (open) stream.write(`${line}\n`);
    },
    isOpen: () => open,
    close: () => {
      open = false;
    },
  };
}

export function fileWriter(path: string): LineWriter {
  const fd = openSync(path, 'w');
  let open = true;

  return {
    write: (line) => {
      writeSync(fd, `${line}\n`);
    },
    isOpen: () => open,
    close: () => {
      if (!open) return;
      open = false;
      closeSync(fd);
    },
  };
}

export function openWriter(output: string | undefined): LineWriter {
  return output ? fileWriter(output) : streamWriter(process.stdout);
}
