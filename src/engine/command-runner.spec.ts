import { createLineBuffer, ProcessCommandRunner, SPAWN_FAILURE_EXIT_CODE } from './command-runner';

type Line = [string, 'stdout' | 'stderr'];

async function runNode(script: string, input?: string) {
  const lines: Line[] = [];
  const outcome = await new ProcessCommandRunner().run(
    { label: 'node -e', program: process.execPath, args: ['-e', script], input },
    { env: process.env, onLine: (line, stream) => lines.push([line, stream]) },
  );
  return { outcome, lines };
}

describe('ProcessCommandRunner', () => {
  it('keeps a multibyte character split across two writes whole', async () => {
    // "€" is e2 82 ac; the second half arrives in a later chunk.
    const script = [
      'process.stdout.write(Buffer.from([0xe2, 0x82]));',
      'setTimeout(() => process.stdout.write(Buffer.from([0xac, 0x0a])), 50);',
    ].join('\n');

    const { outcome, lines } = await runNode(script);

    expect(outcome).toEqual({ exitCode: 0 });
    expect(lines).toEqual([['€', 'stdout']]);
  });

  it('writes the input to stdin and flushes an unterminated last line', async () => {
    const { outcome, lines } = await runNode('process.stdin.pipe(process.stdout);', 'kind: List\nitems: []');

    expect(outcome.exitCode).toBe(0);
    expect(lines).toEqual([
      ['kind: List', 'stdout'],
      ['items: []', 'stdout'],
    ]);
  });

  it('tags stderr lines and reports the exit code', async () => {
    const { outcome, lines } = await runNode("process.stderr.write('denied\\n'); process.exitCode = 3;");

    expect(outcome).toEqual({ exitCode: 3 });
    expect(lines).toEqual([['denied', 'stderr']]);
  });

  it('runs shell commands through the shell', async () => {
    const lines: string[] = [];

    const outcome = await new ProcessCommandRunner().run(
      { label: 'smoke', program: 'echo first; echo second', args: [], shell: true },
      { env: process.env, onLine: (line) => lines.push(line) },
    );

    expect(outcome.exitCode).toBe(0);
    expect(lines).toEqual(['first', 'second']);
  });

  it('reports a program that cannot be started as exit code 127', async () => {
    const outcome = await new ProcessCommandRunner().run(
      { label: 'missing', program: '/nonexistent/deploy-tool', args: [] },
      { env: process.env, onLine: () => undefined },
    );

    expect(outcome.exitCode).toBe(SPAWN_FAILURE_EXIT_CODE);
    expect(outcome.spawnError).toContain('ENOENT');
  });
});

describe('createLineBuffer', () => {
  it('splits on LF and CRLF and holds a partial line until flushed', () => {
    const lines: string[] = [];
    const buffer = createLineBuffer((line) => lines.push(line));

    buffer.write('one\r\ntw');
    buffer.write('o\nthr');
    expect(lines).toEqual(['one', 'two']);

    buffer.flush();
    expect(lines).toEqual(['one', 'two', 'thr']);
  });
});
