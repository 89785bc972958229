/**
 * LogMultiplexer Unit Tests
 */

import { describe, it, beforeEach } from 'mocha';
import { strict as assert } from 'assert';
import { PassThrough } from 'stream';
import {
  LogMultiplexer,
  escapeLine,
  formatLogLine,
  formatPrefix,
  formatTimestamp,
} from '../../../src/supervisor/log-multiplexer';
import { pickColor } from '../../../src/supervisor/colors';
import { ErrorCode, UsageError } from '../../../src/errors';
import { CYAN, FIXED_CLOCK, MemorySink, RESET, nextTurn } from '../../helpers/fake-process';

describe('LogMultiplexer', () => {
  let sink: MemorySink;
  let mux: LogMultiplexer;

  beforeEach(() => {
    sink = new MemorySink();
    mux = new LogMultiplexer({
      prefix: formatPrefix('web', 3),
      color: pickColor(0),
      output: sink,
      clock: FIXED_CLOCK,
    });
  });

  describe('formatting helpers', () => {
    it('should pad the name to the width plus one space before the separator', () => {
      assert.equal(formatPrefix('web', 6), 'web    |');
      assert.equal(formatPrefix('worker', 6), 'worker |');
      assert.equal(formatPrefix('', 0), ' |');
    });

    it('should format the timestamp as zero-padded local HH:MM:SS', () => {
      assert.equal(formatTimestamp(new Date(2026, 5, 7, 8, 9, 1)), '08:09:01');
      assert.equal(formatTimestamp(new Date(2026, 5, 7, 23, 59, 59)), '23:59:59');
    });

    it('should double every backslash', () => {
      assert.equal(escapeLine('C:\\temp\\new'), 'C:\\\\temp\\\\new');
      assert.equal(escapeLine('no escapes'), 'no escapes');
    });

    it('should build color, time, prefix, reset, then the line', () => {
      const line = formatLogLine('hello', { prefix: 'api |', color: pickColor(0), now: FIXED_CLOCK() });
      assert.equal(line, `${CYAN}03:04:05 api |${RESET} hello`);
    });

    it('should omit the reset when color is disabled', () => {
      const line = formatLogLine('hello', {
        prefix: 'api |',
        color: { name: 'cyan', code: '' },
        now: FIXED_CLOCK(),
      });
      assert.equal(line, '03:04:05 api | hello');
    });
  });

  describe('constructor', () => {
    it('should throw UsageError when no prefix is configured', () => {
      assert.throws(
        () => new LogMultiplexer({ prefix: '', color: pickColor(0), output: sink }),
        (error: unknown) =>
          error instanceof UsageError && error.code === ErrorCode.E201_FORMATTER_NOT_CONFIGURED
      );
    });
  });

  describe('multiplex()', () => {
    it('should emit one formatted line per input line', async () => {
      const input = new PassThrough();
      const done = mux.multiplex(input);
      input.end('hello\nworld\n');

      const result = await done;

      assert.deepEqual(result, { lines: 2, stopped: false });
      assert.deepEqual(sink.chunks, [
        `${CYAN}03:04:05 web |${RESET} hello\n`,
        `${CYAN}03:04:05 web |${RESET} world\n`,
      ]);
    });

    it('should emit a final line that has no trailing newline', async () => {
      const input = new PassThrough();
      const done = mux.multiplex(input);
      input.end('first\nlast');

      await done;

      assert.deepEqual(sink.lines(), [
        `${CYAN}03:04:05 web |${RESET} first`,
        `${CYAN}03:04:05 web |${RESET} last`,
      ]);
    });

    it('should keep trailing whitespace, carriage returns and empty lines', async () => {
      const input = new PassThrough();
      const done = mux.multiplex(input);
      input.end('a  \r\n\nb\t\n');

      const result = await done;

      assert.equal(result.lines, 3);
      assert.deepEqual(sink.chunks, [
        `${CYAN}03:04:05 web |${RESET} a  \r\n`,
        `${CYAN}03:04:05 web |${RESET} \n`,
        `${CYAN}03:04:05 web |${RESET} b\t\n`,
      ]);
    });

    it('should escape backslashes in forwarded lines', async () => {
      const input = new PassThrough();
      const done = mux.multiplex(input);
      input.end('path\\to\\file\n');

      await done;

      assert.deepEqual(sink.lines(), [`${CYAN}03:04:05 web |${RESET} path\\\\to\\\\file`]);
    });

    it('should reassemble lines and characters split across chunks', async () => {
      const input = new PassThrough();
      const done = mux.multiplex(input);
      const bytes = Buffer.from('caf\u00e9 ok\n', 'utf8');
      input.write(bytes.subarray(0, 4));
      input.write(bytes.subarray(4, 5));
      input.end(bytes.subarray(5));

      await done;

      assert.deepEqual(sink.lines(), [`${CYAN}03:04:05 web |${RESET} caf\u00e9 ok`]);
    });

    it('should forward several inputs and keep order within each', async () => {
      const out = new PassThrough();
      const err = new PassThrough();
      const done = mux.multiplex(out, err);
      out.write('out-1\n');
      err.write('err-1\n');
      out.write('out-2\n');
      err.end('err-2\n');
      out.end('out-3\n');

      const result = await done;

      assert.equal(result.lines, 5);
      const texts = sink.lines().map((line) => line.slice(line.indexOf(RESET) + RESET.length + 1));
      assert.deepEqual(texts.filter((t) => t.startsWith('out')), ['out-1', 'out-2', 'out-3']);
      assert.deepEqual(texts.filter((t) => t.startsWith('err')), ['err-1', 'err-2']);
    });

    it('should resolve with zero lines for an empty input', async () => {
      const input = new PassThrough();
      const done = mux.multiplex(input);
      input.end();

      assert.deepEqual(await done, { lines: 0, stopped: false });
      assert.deepEqual(sink.chunks, []);
    });
  });

  describe('stop()', () => {
    it('should destroy the inputs and resolve without further lines', async () => {
      const input = new PassThrough();
      const done = mux.multiplex(input);
      input.write('first\n');
      await nextTurn();

      mux.stop();
      const result = await done;

      assert.deepEqual(result, { lines: 1, stopped: true });
      assert.equal(input.destroyed, true);
      assert.equal(mux.isStopped(), true);
    });

    it('should drop a pending partial line', async () => {
      const input = new PassThrough();
      const done = mux.multiplex(input);
      input.write('partial');
      await nextTurn();

      mux.stop();
      await done;

      assert.deepEqual(sink.chunks, []);
    });

    it('should be idempotent and refuse inputs added after stopping', async () => {
      mux.stop();
      mux.stop();
      const late = new PassThrough();

      const result = await mux.multiplex(late);

      assert.deepEqual(result, { lines: 0, stopped: true });
      assert.equal(late.destroyed, true);
    });
  });
});
