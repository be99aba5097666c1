import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { helpText, parseArgs, runImpc } from '../src/bin/impc-core.js';
import { createLogger } from '../src/utils/logger.js';

describe('impc CLI', () => {
  let dir: string;
  let out: string[];
  let err: string[];

  const run = (...argv: string[]) =>
    runImpc(argv, {
      cwd: dir,
      isTTY: false,
      log: createLogger({ color: false, out: line => out.push(line), err: line => err.push(line) }),
    });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'impc-cli-'));
    out = [];
    err = [];
    fs.writeFileSync(path.join(dir, 'a.imp'), 'int x;\nint y = 5;\n');
    fs.writeFileSync(path.join(dir, 'b.imp'), 'x = 1;\n');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('parses files and flags', () => {
    const { command, files, args } = parseArgs(['build', 'a.imp', '--no-color', 'b.imp', '--indent', '4']);
    expect(command).toBe('build');
    expect(files).toEqual(['a.imp', 'b.imp']);
    expect(args.get('--no-color')).toBe(true);
    expect(args.get('--indent')).toBe('4');
  });

  test('build prints the rendered program', async () => {
    await expect(run('build', 'a.imp')).resolves.toBe(0);
    expect(out).toEqual(['int x;\nint y = 5;']);
  });

  test('build writes into --out-dir', async () => {
    await expect(run('build', 'a.imp', '--out-dir', 'out')).resolves.toBe(0);
    expect(fs.readFileSync(path.join(dir, 'out', 'a.imp'), 'utf-8')).toBe('int x;\nint y = 5;\n');
    expect(out).toEqual([`🔧 a.imp → ${path.join('out', 'a.imp')}`]);
  });

  test('build never overwrites its input', async () => {
    await expect(run('build', 'a.imp', '--out-dir', '.')).resolves.toBe(1);
    expect(err).toEqual(['❌ Refusing to overwrite a.imp with its own output']);
    expect(fs.readFileSync(path.join(dir, 'a.imp'), 'utf-8')).toBe('int x;\nint y = 5;\n');
  });

  test('check reports diagnostics and fails', async () => {
    await expect(run('check', 'b.imp')).resolves.toBe(1);
    expect(err).toEqual([
      '[Line 1] semantic error: undeclared variable x\n1 | x = 1;\n    ~~~~~~',
      '1 semantic error in b.imp',
    ]);
  });

  test('globs are expanded', async () => {
    await expect(run('check', '*.imp')).resolves.toBe(1);
    expect(out).toEqual(['✅ a.imp: no semantic errors']);
    expect(err[err.length - 1]).toBe('1 semantic error in b.imp');
  });

  test('entries come from the config file', async () => {
    fs.writeFileSync(path.join(dir, 'impc.config.json'), JSON.stringify({ entries: ['a.imp'], indent: 4 }));
    await expect(run('check')).resolves.toBe(0);
    expect(out).toEqual(['✅ a.imp: no semantic errors']);
  });

  test('syntax errors fail the file', async () => {
    fs.writeFileSync(path.join(dir, 'c.imp'), 'int = ;\n');
    await expect(run('check', 'c.imp')).resolves.toBe(1);
    expect(err[0]).toBe('❌ Syntax error in c.imp');
  });

  test('invalid flags and commands are rejected', async () => {
    await expect(run('build', 'a.imp', '--indent', 'zero')).resolves.toBe(1);
    expect(err).toEqual(['❌ --indent expects a positive integer, got "zero"']);

    await expect(run('compile', 'a.imp')).resolves.toBe(1);
    expect(err[1]).toBe('❌ Unknown command "compile"');
  });

  test('--out takes a single input', async () => {
    await expect(run('build', 'a.imp', 'b.imp', '--out', 'x.imp')).resolves.toBe(1);
    expect(err).toEqual(['❌ --out takes a single input; use --out-dir for several']);
  });

  test('help is printed without a command', async () => {
    await expect(run()).resolves.toBe(0);
    expect(out).toEqual([helpText()]);
  });
});
