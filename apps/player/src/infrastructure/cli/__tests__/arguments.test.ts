/**
 * Tests for command-line argument parsing
 */

import { parseCliArguments } from '../arguments';

describe('parseCliArguments', () => {
  it('shows the menu without a command', () => {
    expect(parseCliArguments([])).toEqual({
      success: true,
      value: { kind: 'menu', options: {} }
    });
  });

  it('parses a mode with its directory and options', () => {
    expect(parseCliArguments(['list', '/music/albums', '--player', 'mplayer', '--media-only'])).toEqual({
      success: true,
      value: {
        kind: 'mode',
        mode: 'list',
        directory: '/music/albums',
        options: { player: 'mplayer', mediaOnly: true }
      }
    });
  });

  it('accepts the short player flag', () => {
    expect(parseCliArguments(['-p', 'vlc', 'shuffle'])).toEqual({
      success: true,
      value: { kind: 'mode', mode: 'shuffle', options: { player: 'vlc' } }
    });
  });

  it('takes a search term and a directory', () => {
    expect(parseCliArguments(['search', 'live', 'concerts'])).toEqual({
      success: true,
      value: { kind: 'mode', mode: 'search', term: 'live', directory: 'concerts', options: {} }
    });
  });

  it('leaves the search term to the prompt when omitted', () => {
    expect(parseCliArguments(['search'])).toEqual({
      success: true,
      value: { kind: 'mode', mode: 'search', options: {} }
    });
  });

  it.each([
    [['--help'], 'help'],
    [['-h', 'list'], 'help'],
    [['--version'], 'version'],
    [['-v'], 'version']
  ])('parses %p as %s', (argv, kind) => {
    const result = parseCliArguments(argv);

    expect(result.success && result.value.kind).toBe(kind);
  });

  it('rejects an unknown command', () => {
    expect(parseCliArguments(['repeat'])).toEqual({ success: false, error: "Unknown command 'repeat'" });
  });

  it('rejects extra arguments', () => {
    expect(parseCliArguments(['list', 'a', 'b'])).toEqual({
      success: false,
      error: "Too many arguments for 'list'"
    });
    expect(parseCliArguments(['search', 'a', 'b', 'c'])).toEqual({
      success: false,
      error: "Too many arguments for 'search'"
    });
  });

  it('rejects an unknown option', () => {
    const result = parseCliArguments(['--loud']);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toContain("Unknown option '--loud'");
  });
});
