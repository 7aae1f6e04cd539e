/**
 * CLI Tests
 *
 * The command is run in-process with captured output streams.
 */

import { CliIO, runCli } from '../src/cli/program';
import {
  PuzzleGenerator,
  createSeededRandom,
  toPuzzleDocument,
} from '../src/puzzle-generator';

interface CapturedIO extends CliIO {
  out: string[];
  err: string[];
}

function captureIO(): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
  };
}

describe('hash-puzzle CLI', () => {
  it('prints a seeded puzzle document', () => {
    const io = captureIO();

    const exitCode = runCli(['--technique', 'chaining', '--difficulty', 'medium', '--seed', '42'], io);

    const expected = toPuzzleDocument(
      new PuzzleGenerator({ random: createSeededRandom(42) }).generatePuzzle('chaining', 'medium')
    );
    expect(exitCode).toBe(0);
    expect(io.out).toEqual([JSON.stringify(expected)]);
    expect(io.err).toEqual([]);
  });

  it('defaults to an easy linear probing puzzle', () => {
    const io = captureIO();

    expect(runCli([], io)).toBe(0);

    const document = JSON.parse(io.out[0]);
    expect(document.technique).toBe('linear_probing');
    expect(document.technique_label).toBe('Linear Probing');
    expect(document.table_size).toBe(7);
    expect(document.solution).toHaveLength(7);
  });

  it('falls back to linear probing for an unknown technique', () => {
    const io = captureIO();

    expect(runCli(['-t', 'robin_hood', '--seed', '3'], io)).toBe(0);
    expect(JSON.parse(io.out[0]).technique).toBe('linear_probing');
  });

  it('indents output with --pretty', () => {
    const io = captureIO();

    runCli(['--pretty', '--seed', '5'], io);

    expect(io.out[0].startsWith('{\n  "technique": "linear_probing",\n')).toBe(true);
  });

  it('prints statistics to stderr with --stats', () => {
    const io = captureIO();

    runCli(['-t', 'double_hashing', '-d', 'hard', '--seed', '11', '--stats'], io);

    const document = JSON.parse(io.out[0]);
    const stats = JSON.parse(io.err[0]);
    expect(stats.keyCount).toBe(document.keys.length);
    expect(stats.placedCount + stats.failedCount).toBe(stats.keyCount);
  });

  it('fails with exit code 1 for an unknown difficulty', () => {
    const io = captureIO();

    const exitCode = runCli(['--difficulty', 'impossible'], io);

    expect(exitCode).toBe(1);
    expect(io.out).toEqual([]);
    expect(io.err).toEqual([
      'Error: Unknown difficulty "impossible" (expected one of: easy, medium, hard)',
    ]);
  });

  it('rejects a non-integer seed', () => {
    const io = captureIO();

    const exitCode = runCli(['--seed', 'abc'], io);

    expect(exitCode).toBe(1);
    expect(io.out).toEqual([]);
    expect(io.err).toHaveLength(1);
    expect(io.err[0]).toContain('Seed must be an integer.');
  });
});
