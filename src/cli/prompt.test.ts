import { PassThrough } from 'stream';
import { PromptAbortedError, readSecret } from './prompt.js';

function capture() {
  const output = new PassThrough();
  let written = '';
  output.on('data', (chunk: Buffer) => { written += chunk.toString(); });
  return { output, written: () => written };
}

function fakeTty() {
  return Object.assign(new PassThrough(), { isTTY: true, setRawMode: vi.fn() });
}

describe('readSecret from a pipe', () => {
  it('returns the first line', async () => {
    const input = new PassThrough();
    const { output } = capture();

    const pending = readSecret('Secret: ', input, output);
    input.end('test-secret\nsecond line\n');

    await expect(pending).resolves.toBe('test-secret');
  });

  it('rejects when the input closes without a line', async () => {
    const input = new PassThrough();
    const { output } = capture();

    const pending = readSecret('Secret: ', input, output);
    input.end();

    await expect(pending).rejects.toBeInstanceOf(PromptAbortedError);
  });
});

describe('readSecret from a terminal', () => {
  it('reads in raw mode without echoing and honours backspace', async () => {
    const input = fakeTty();
    const { output, written } = capture();

    const pending = readSecret('Secret: ', input, output);
    input.write('ab\u007fc\r');

    await expect(pending).resolves.toBe('ac');
    expect(input.setRawMode.mock.calls).toEqual([[true], [false]]);
    await new Promise((r) => setImmediate(r));
    expect(written()).toBe('Secret: \n');
  });

  it('aborts on Ctrl-C and restores the terminal', async () => {
    const input = fakeTty();
    const { output } = capture();

    const pending = readSecret('Secret: ', input, output);
    input.write('ab\u0003');

    await expect(pending).rejects.toBeInstanceOf(PromptAbortedError);
    expect(input.setRawMode).toHaveBeenLastCalledWith(false);
  });
});
