import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { PassThrough } from 'stream';
import { fileWriter, streamWriter } from './line-writer';

const errnoError = (code: string) => Object.assign(new Error(`write ${code}`), { code });

describe('streamWriter', () => {
  const exitCode = process.exitCode;

  afterEach(() => {
    process.exitCode = exitCode;
  });

  it('writes one line per call', () => {
    const stream = new PassThrough();
    const writer = streamWriter(stream);

    writer.write('{"a":1}');
    writer.write('{"a":2}');

    expect(stream.read()?.toString()).toBe('{"a":1}\n{"a":2}\n');
    expect(writer.isOpen()).toBe(true);
  });

  it('stops quietly when the reader closes the pipe', () => {
    const stream = new PassThrough();
    const writer = streamWriter(stream);

    stream.emit('error', errnoError('EPIPE'));

    expect(writer.isOpen()).toBe(false);
    expect(() => writer.write('{"a":1}')).not.toThrow();
    expect(process.exitCode).toBe(exitCode);
  });

  it('flags other stream failures with a non-zero exit code', () => {
    const stream = new PassThrough();
    const writer = streamWriter(stream);

    stream.emit('error', errnoError('EIO'));

    expect(writer.isOpen()).toBe(false);
    expect(process.exitCode).toBe(1);
  });
});

describe('fileWriter', () => {
  it('writes lines to the file and closes once', () => {
    const dir = mkdtempSync(join(tmpdir(), 'sheet-records-out-'));
    try {
      const path = join(dir, 'out.ndjson');
      const writer = fileWriter(path);

      writer.write('{"a":1}');
      writer.close();
      writer.close();

      expect(writer.isOpen()).toBe(false);
      expect(readFileSync(path, 'utf8')).toBe('{"a":1}\n');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
