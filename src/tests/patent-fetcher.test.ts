// src/tests/patent-fetcher.test.ts
import { runCli } from '../cli/patent-fetcher';

describe('runCli', () => {
  let errorLog: jest.SpyInstance;

  beforeEach(() => {
    errorLog = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should exit 1 for an unknown command', async () => {
    await expect(runCli(['node', 'patent-fetcher', 'bogus'])).resolves.toBe(1);
  });

  it('should exit 1 when download is given no patent numbers', async () => {
    await expect(runCli(['node', 'patent-fetcher', 'download'])).resolves.toBe(1);
    expect(errorLog).toHaveBeenCalledWith(expect.stringContaining('no patent numbers given'));
  });

  it('should exit 1 when info is missing its argument', async () => {
    await expect(runCli(['node', 'patent-fetcher', 'info'])).resolves.toBe(1);
  });

  it('should exit 0 for --help', async () => {
    jest.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await expect(runCli(['node', 'patent-fetcher', '--help'])).resolves.toBe(0);
  });
});
