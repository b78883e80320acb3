import { describe, expect, test } from 'vitest';
import { formatHelp } from '../../src/cli/help';
import { parseCliArgs } from '../../src/cli/parse';

describe('cli parser', () => {
  test('defaults to run when no args', () => {
    expect(parseCliArgs([])).toEqual({ ok: true, command: { kind: 'run' } });
  });

  test('parses --help at root', () => {
    expect(parseCliArgs(['--help'])).toEqual({ ok: true, command: { kind: 'help', topic: 'root' } });
  });

  test('parses help topics', () => {
    expect(parseCliArgs(['search', '-h'])).toEqual({ ok: true, command: { kind: 'help', topic: 'search' } });
    expect(parseCliArgs(['help', 'run'])).toEqual({ ok: true, command: { kind: 'help', topic: 'run' } });
  });

  test('parses version flags', () => {
    expect(parseCliArgs(['-v'])).toEqual({ ok: true, command: { kind: 'version' } });
    expect(parseCliArgs(['--version', 'x'])).toEqual({ ok: false, error: 'Unknown argument: x' });
  });

  test('parses run --pane', () => {
    expect(parseCliArgs(['run', '--pane', '%3'])).toEqual({ ok: true, command: { kind: 'run', pane: '%3' } });
    expect(parseCliArgs(['--pane=%4'])).toEqual({ ok: true, command: { kind: 'run', pane: '%4' } });
  });

  test('rejects an empty pane', () => {
    expect(parseCliArgs(['run', '--pane', ''])).toEqual({ ok: false, error: 'Pane id must not be empty.' });
  });

  test('interactive requires --pane', () => {
    expect(parseCliArgs(['interactive'])).toEqual({ ok: false, error: 'Missing --pane.' });
    expect(parseCliArgs(['interactive', '--pane', '%1'])).toEqual({
      ok: true,
      command: { kind: 'interactive', pane: '%1' },
    });
  });

  test('parses search options', () => {
    const result = parseCliArgs([
      'search',
      '--query',
      'main',
      '--file=log.txt',
      '--case-sensitive',
      '--separators',
      '\\t/',
      '--labels',
      'jkl',
      '--top-first',
    ]);
    expect(result).toEqual({
      ok: true,
      command: {
        kind: 'search',
        query: 'main',
        file: 'log.txt',
        caseSensitive: true,
        separators: '\t/',
        labels: 'jkl',
        topFirst: true,
      },
    });
  });

  test('search defaults', () => {
    expect(parseCliArgs(['search', '--query', 'x'])).toEqual({
      ok: true,
      command: {
        kind: 'search',
        query: 'x',
        caseSensitive: false,
        separators: null,
        labels: null,
        topFirst: false,
      },
    });
  });

  test('search requires a query', () => {
    expect(parseCliArgs(['search'])).toEqual({ ok: false, error: 'Missing --query.' });
    expect(parseCliArgs(['search', '--query'])).toEqual({ ok: false, error: 'Missing value for --query.' });
  });

  test('rejects unknown commands and arguments', () => {
    expect(parseCliArgs(['attach'])).toEqual({ ok: false, error: 'Unknown command: attach' });
    expect(parseCliArgs(['run', '--json'])).toEqual({ ok: false, error: 'Unknown argument: --json' });
  });
});

describe('help', () => {
  test('includes the version in the header', () => {
    expect(formatHelp('search', '1.2.3').split('\n')[0]).toBe('paneflash v1.2.3 search');
    expect(formatHelp('root', 'unknown').split('\n')[0]).toBe('paneflash');
  });
});
