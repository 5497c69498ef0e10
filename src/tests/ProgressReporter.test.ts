// src/tests/ProgressReporter.test.ts
import { ProgressReporter } from '../utils/ProgressReporter';
import { CapturedStream, captureStream } from './helpers/capture-stream';

describe('ProgressReporter', () => {
  let out: CapturedStream;
  let err: CapturedStream;
  let reporter: ProgressReporter;

  beforeEach(() => {
    out = captureStream();
    err = captureStream();
    reporter = new ProgressReporter({ out: out.stream, err: err.stream, barLength: 10 });
  });

  describe('formatLine', () => {
    it('should draw the bar with percentage and patent status', () => {
      expect(reporter.formatLine(2, 4, 'US1', true)).toBe('\r▶️ █████░░░░░ 50% (2/4) [US1] ✅');
      expect(reporter.formatLine(1, 3, 'X', false)).toBe('\r▶️ ███░░░░░░░ 33% (1/3) [X] ❌');
    });

    it('should omit the patent info when no number is given', () => {
      expect(reporter.formatLine(0, 2)).toBe('\r▶️ ░░░░░░░░░░ 0% (0/2)');
    });

    it('should fall back to a counter without a total', () => {
      expect(reporter.formatLine(0, 0)).toBe('\rProgress: 0 processed');
    });
  });

  it('should redraw only while active', () => {
    reporter.update(1, 2, 'AAA1');
    expect(out.chunks).toEqual([]);

    reporter.start(2);
    reporter.asCallback()(1, 2, 'AAA1', true);

    expect(reporter.isActive).toBe(true);
    expect(out.chunks).toEqual([
      '\r▶️ ░░░░░░░░░░ 0% (0/2)',
      '\r▶️ █████░░░░░ 50% (1/2) [AAA1] ✅'
    ]);
  });

  it('should clear the bar on finish', () => {
    reporter.start(2);
    const line = out.chunks[0];
    reporter.finish();

    expect(reporter.isActive).toBe(false);
    expect(out.chunks[1]).toBe(`\r${' '.repeat(line.length)}\r`);

    reporter.update(2, 2, 'BBB2');
    expect(out.chunks).toHaveLength(2);
  });

  it('should print log lines above an active bar and redraw it', async () => {
    reporter.start(2);
    const line = out.chunks[0];

    await new Promise<void>(resolve => reporter.stream.write('slow response\n', () => resolve()));

    expect(err.text()).toBe('slow response\n');
    expect(out.chunks).toEqual([line, `\r${' '.repeat(line.length)}\r`, line]);
  });

  it('should route stream writes to err', async () => {
    await new Promise<void>(resolve => reporter.stream.write('log line', () => resolve()));

    expect(err.text()).toBe('log line\n');
  });
});
