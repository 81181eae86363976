import { describe, it, expect } from 'vitest';
import { EXIT_DISPATCH_ERROR, EXIT_OK, EXIT_USAGE, runCli } from './run';
import { USAGE } from './args';

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    io: {
      out: (line: string) => { out.push(line); },
      err: (line: string) => { err.push(line); },
    },
  };
}

describe('runCli', () => {
  it('runs on, off and undo and logs each device change', () => {
    const { out, err, io } = capture();
    expect(runCli(['on', 'off', 'undo', 'state'], io)).toBe(EXIT_OK);
    expect(out).toEqual([
      '[light] ON',
      '[light] OFF',
      '[light] ON',
      'state: on',
      'history: TurnOn',
    ]);
    expect(err).toEqual([]);
  });

  it('prints an empty history', () => {
    const { out, io } = capture();
    expect(runCli(['state'], io)).toBe(EXIT_OK);
    expect(out).toEqual(['state: off', 'history: (empty)']);
  });

  it('prints state as JSON', () => {
    const { out, io } = capture();
    runCli(['--quiet', '--json', 'on', 'state'], io);
    expect(out).toEqual(['{"isOn":true,"current":"TurnOn","history":["TurnOn"],"capacity":10}']);
  });

  it('re-dispatches the selected action', () => {
    const { out, io } = capture();
    runCli(['-q', 'off', 'dispatch', 'state'], io);
    expect(out).toEqual(['state: off', 'history: TurnOff, TurnOff']);
  });

  it('honours --capacity', () => {
    const { out, io } = capture();
    runCli(['-q', '--capacity', '2', 'on', 'off', 'on', 'state'], io);
    expect(out).toEqual(['state: on', 'history: TurnOff, TurnOn']);
  });

  it('exits 1 on undo with empty history and stops there', () => {
    const { out, err, io } = capture();
    expect(runCli(['undo', 'on'], io)).toBe(EXIT_DISPATCH_ERROR);
    expect(err).toEqual(['error: Nothing to undo']);
    expect(out).toEqual([]);
  });

  it('exits 1 on dispatch with no action selected', () => {
    const { err, io } = capture();
    expect(runCli(['dispatch'], io)).toBe(EXIT_DISPATCH_ERROR);
    expect(err).toEqual(['error: No action selected']);
  });

  it('exits 1 once undo runs past the recorded history', () => {
    const { out, err, io } = capture();
    expect(runCli(['on', 'undo', 'undo'], io)).toBe(EXIT_DISPATCH_ERROR);
    expect(out).toEqual(['[light] ON', '[light] OFF']);
    expect(err).toEqual(['error: Nothing to undo']);
  });

  it('exits 2 with usage on a bad command line', () => {
    const { err, io } = capture();
    expect(runCli(['blink'], io)).toBe(EXIT_USAGE);
    expect(err).toEqual(['error: Unknown command: blink', USAGE]);
  });

  it('prints usage for --help', () => {
    const { out, io } = capture();
    expect(runCli(['--help'], io)).toBe(EXIT_OK);
    expect(out).toEqual([USAGE]);
  });
});
