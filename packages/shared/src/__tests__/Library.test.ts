/**
 * Tests for library construction, filtering and error details
 */

import { ErrorFactory, LibraryFactory } from '../index';

describe('LibraryFactory', () => {
  describe('filterByTerm', () => {
    it('matches the base name case-insensitively', () => {
      const files = ['song.mp3', 'Song2.wav', 'note.txt'];

      expect(LibraryFactory.filterByTerm(files, 'song')).toEqual(['song.mp3', 'Song2.wav']);
    });

    it('ignores directory components', () => {
      const files = ['/music/songs/intro.mp3', '/music/other/song.ogg'];

      expect(LibraryFactory.filterByTerm(files, 'song')).toEqual(['/music/other/song.ogg']);
    });

    it('keeps every file for an empty term', () => {
      expect(LibraryFactory.filterByTerm(['a.mp3', 'b.mp3'], '')).toEqual(['a.mp3', 'b.mp3']);
    });
  });

  describe('isMediaFile', () => {
    it.each(['track.mp3', 'TRACK.FLAC', 'clip.mkv', 'voice.opus'])('accepts %s', file => {
      expect(LibraryFactory.isMediaFile(file)).toBe(true);
    });

    it.each(['notes.txt', 'cover.jpg', 'README', 'playlist.m3u'])('rejects %s', file => {
      expect(LibraryFactory.isMediaFile(file)).toBe(false);
    });
  });

  it('treats dot-files as hidden', () => {
    expect(LibraryFactory.isHidden('.DS_Store')).toBe(true);
    expect(LibraryFactory.isHidden('track.mp3')).toBe(false);
  });

  describe('create', () => {
    it('rejects an empty file list', () => {
      const result = LibraryFactory.create('/music', [], { recursive: false });

      expect(result).toEqual({ success: false, error: 'EMPTY_LIBRARY' });
    });

    it('takes a frozen snapshot of the files', () => {
      const files = ['/music/a.mp3', '/music/b.mp3'];
      const result = LibraryFactory.create('/music', files, { recursive: true, filterTerm: 'a' });

      expect(result.success).toBe(true);
      if (!result.success) return;

      files.push('/music/c.mp3');
      expect(result.value.files).toEqual(['/music/a.mp3', '/music/b.mp3']);
      expect(Object.isFrozen(result.value.files)).toBe(true);
      expect(result.value.recursive).toBe(true);
      expect(result.value.filterTerm).toBe('a');
    });

    it('omits the filter term when none was used', () => {
      const result = LibraryFactory.create('/music', ['/music/a.mp3'], { recursive: false });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect('filterTerm' in result.value).toBe(false);
    });
  });
});

describe('ErrorFactory', () => {
  it('names the directory for an empty library', () => {
    const details = ErrorFactory.createLibraryError('EMPTY_LIBRARY', { directory: '/music' });

    expect(details.code).toBe('EMPTY_LIBRARY');
    expect(details.message).toBe("No files found in '/music'.");
  });

  it('names the term for an empty search', () => {
    const details = ErrorFactory.createLibraryError('EMPTY_LIBRARY', { directory: '.', filterTerm: 'zzz' });

    expect(details.message).toBe("No files found matching 'zzz' in '.'.");
    expect(details.suggestion).toBe('Try a shorter search term or a different directory');
  });

  it('describes directory failures', () => {
    expect(ErrorFactory.createLibraryError('DIRECTORY_NOT_FOUND', { directory: '/nope' }).message)
      .toBe('Directory does not exist: /nope');
    expect(ErrorFactory.createLibraryError('NOT_A_DIRECTORY', { directory: '/etc/hosts' }).message)
      .toBe('Path is not a directory: /etc/hosts');
    expect(ErrorFactory.createLibraryError('PERMISSION_DENIED', { directory: '/root' }).message)
      .toBe('Permission denied accessing directory: /root');
  });

  it('reports an invalid selection with the valid range', () => {
    const details = ErrorFactory.createSelectionError('INVALID_SELECTION', { count: 3 });

    expect(details.message).toBe('Invalid selection. Exiting.');
    expect(details.suggestion).toBe('Enter a number between 1 and 3');
  });

  it('reports an empty library selection as a library error', () => {
    const details = ErrorFactory.createSelectionError('EMPTY_LIBRARY', { directory: '/music' });

    expect(details.message).toBe("No files found in '/music'.");
  });
});
