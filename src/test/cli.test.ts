import assert from 'assert/strict';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { formatVersion, parseArgs, runCli } from '../cli';
import type { CliDeps } from '../cli';

const TRACE = [
  '-- The C compiler identification is GNU',
  '(10.0) (1) /src/CMakeLists.txt(1):  project(demo )',
  '(10.5) (1) /src/CMakeLists.txt(2):  include(utils.cmake )',
  '(11.0) (2) /src/utils.cmake(1):  set(A 1 )',
  '(12.0) (1) /src/CMakeLists.txt(3):  message(done )',
  ''
].join('\n');

type Captured = { deps: CliDeps; out: string[]; err: string[]; reads: Array<string | undefined> };

function capture(input: string | Error): Captured {
  const out: string[] = [];
  const err: string[] = [];
  const reads: Array<string | undefined> = [];
  const deps: CliDeps = {
    readInput: async file => {
      reads.push(file);
      if (input instanceof Error) throw input;
      return input;
    },
    out: line => out.push(line),
    err: line => err.push(line),
    exit: () => undefined
  };
  return { deps, out, err, reads };
}

suite('cli.parseArgs', () => {
  test('maps flags and the trace argument', () => {
    const result = parseArgs(['-t', '0.01', '--depth', '3', '-s', '-1', '--ignore-nesting', '-w', '60', 'trace.log']);
    assert.equal(result.error, undefined);
    assert.deepEqual(result.options, {
      threshold: '0.01',
      depth: '3',
      sort: true,
      one: true,
      ignoreNesting: true,
      traceInfoWidth: '60',
      trace: 'trace.log'
    });
  });

  test('--help toggles showHelp', () => {
    assert.equal(parseArgs(['--help']).showHelp, true);
  });

  test('a value flag requires a value', () => {
    assert.equal(parseArgs(['--store-file']).error, 'Missing value for --store-file');
  });

  test('unknown flags and extra arguments are errors', () => {
    assert.equal(parseArgs(['--nope']).error, 'Unknown argument: --nope');
    assert.equal(parseArgs(['a.log', 'b.log']).error, 'Unexpected argument: b.log');
  });

  test('"-" reads stdin', () => {
    assert.deepEqual(parseArgs(['-']).options, {});
  });
});

suite('cli.runCli', () => {
  let dir: string;
  let store: string;

  setup(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'trace-cli-'));
    store = path.join(dir, 'calls.json');
  });

  teardown(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('collects a trace, prints the report and saves the tree', async () => {
    const { deps, out, err, reads } = capture(TRACE);
    const code = await runCli(['-f', store, 'build.trace'], deps);
    assert.equal(code, 0);
    assert.deepEqual(reads, ['build.trace']);
    assert.deepEqual(err, ['Ignored: -- The C compiler identification is GNU']);
    // the last line keeps the level of the line before it
    assert.deepEqual(out, [
      '[1]/src/CMakeLists.txt(1):  project(demo ) (0.5sec)(25%)',
      '[1]/src/CMakeLists.txt(2):  include(utils.cmake ) (1.500001sec)(75%)',
      '  [2]/src/utils.cmake(1):  set(A 1 ) (1sec)(50%)',
      '  [2]/src/CMakeLists.txt(3):  message(done ) (0.000001sec)(0%)'
    ]);
    await fs.access(store);
  });

  test('report-only replays the saved tree without reading a trace', async () => {
    await runCli(['-f', store], capture(TRACE).deps);

    const replay = capture(new Error('trace must not be read'));
    const code = await runCli(['-r', '-s', '-f', store], replay.deps);
    assert.equal(code, 0);
    assert.deepEqual(replay.reads, []);
    assert.deepEqual(replay.out, [
      '[1]/src/CMakeLists.txt(2):  include(utils.cmake ) (1.500001sec)(75%)',
      '  [2]/src/utils.cmake(1):  set(A 1 ) (1sec)(50%)',
      '  [2]/src/CMakeLists.txt(3):  message(done ) (0.000001sec)(0%)',
      '[1]/src/CMakeLists.txt(1):  project(demo ) (0.5sec)(25%)'
    ]);
  });

  test('report-only without a saved tree prints nothing', async () => {
    const { deps, out } = capture('');
    assert.equal(await runCli(['-r', '-f', store], deps), 0);
    assert.deepEqual(out, []);
  });

  test('a structural error aborts without a report and removes the store', async () => {
    await runCli(['-f', store], capture(TRACE).deps);
    await fs.access(store);

    const broken = capture(
      ['(1.0) (1) /src/CMakeLists.txt(1):  a( )', '(2.0) (3) /src/CMakeLists.txt(2):  b( )', '(3.0) (1) /src/CMakeLists.txt(3):  c( )'].join('\n')
    );
    await assert.rejects(runCli(['-f', store], broken.deps), { name: 'TraceStructureError' });
    assert.deepEqual(broken.out, []);
    await assert.rejects(fs.access(store));
  });

  test('an unreadable trace keeps the saved tree', async () => {
    await runCli(['-f', store], capture(TRACE).deps);
    const saved = await fs.readFile(store, 'utf8');
    const failing = capture(new Error('ENOENT: no such file'));
    await assert.rejects(runCli(['-f', store, 'missing.trace'], failing.deps), /no such file/);
    assert.deepEqual(failing.out, []);
    assert.equal(await fs.readFile(store, 'utf8'), saved);
  });

  test('report-only with a trace file is a configuration error', async () => {
    const { deps, out, err, reads } = capture(TRACE);
    const code = await runCli(['-r', '-f', store, 'build.trace'], deps);
    assert.equal(code, 1);
    assert.equal(err[0], '--report-only cannot be combined with a trace file');
    assert.deepEqual(out, []);
    assert.deepEqual(reads, []);
  });

  test('invalid numbers are configuration errors', async () => {
    const { deps, err } = capture(TRACE);
    assert.equal(await runCli(['-d', '-2', '-f', store], deps), 1);
    assert.equal(err[0], 'Depth must not be negative');
  });

  test('unknown flags print usage and fail', async () => {
    const { deps, err } = capture(TRACE);
    assert.equal(await runCli(['--nope'], deps), 1);
    assert.equal(err[0], 'Unknown argument: --nope');
    assert.ok(err[1]?.startsWith('Usage: trace-profile-stat'));
  });

  test('--version prints the program name', async () => {
    const { deps, err } = capture(TRACE);
    assert.equal(await runCli(['--version'], deps), 0);
    assert.deepEqual(err, [formatVersion()]);
  });
});
