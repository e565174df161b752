import { describe, expect, it } from 'vitest';
import { validate } from '../src/subsonic/validate.js';
import { ValidationError } from '../src/subsonic/errors.js';

const full:SubsonicResponse = {
  status: 'ok',
  album: { id: 'al-1', song: [{ id: 'so-1' }] },
  albumList: { album: [{ id: 'al-1' }] },
  playlist: { id: 'pl-1', name: 'mix' },
  playlists: { playlist: [{ id: 'pl-1', name: 'mix' }] },
};

function failure(result:ReturnType<typeof validate>):ValidationError {
  if (result.ok) { throw new Error('expected validation to fail'); }
  return result.error;
}

describe('validate', () => {
  it.each(['failed', '', 'OK', 'ok '])('rejects status %j whatever the payload', (status) => {
    const error = failure(validate({ ...full, status }, 'raw body', 'album'));
    expect(error.kind).toBe('notOk');
    expect(error.message).toBe('Subsonic response did not have \'ok\' status: raw body');
  });

  it('rejects a failed status even when nothing is expected', () => {
    expect(failure(validate({ status: 'failed' }, '{}', 'none')).kind).toBe('notOk');
  });

  it('includes the server error code and message', () => {
    const error = failure(validate({ status: 'failed', error: { code: 40, message: 'Wrong username or password' } }, 'raw body', 'playlists'));
    expect(error.message).toBe('Subsonic response did not have \'ok\' status: [40] Wrong username or password: raw body');
  });

  it.each([
    ['album', 'Subsonic response was missing an album: {}'],
    ['albumList', 'Subsonic response was missing an albumList: {}'],
    ['playlist', 'Subsonic response was missing a playlist: {}'],
    ['playlists', 'Subsonic response was missing a playlists: {}'],
  ] as const)('reports a missing %s on an ok response', (kind, message) => {
    const error = failure(validate({ status: 'ok' }, '{}', kind));
    expect(error.kind).toBe('missingPayload');
    expect(error.payload).toBe(kind);
    expect(error.message).toBe(message);
  });

  it('only requires the payload that was asked for', () => {
    expect(validate({ status: 'ok', playlist: { id: 'pl-1', name: 'mix' } }, '{}', 'playlist').ok).toBe(true);
    expect(validate({ status: 'ok', playlist: { id: 'pl-1', name: 'mix' } }, '{}', 'album').ok).toBe(false);
  });

  it('accepts present wrappers with nothing inside them', () => {
    expect(validate({ status: 'ok', playlists: {} }, '{}', 'playlists').ok).toBe(true);
    expect(validate({ status: 'ok', playlists: { playlist: [] } }, '{}', 'playlists').ok).toBe(true);
    expect(validate({ status: 'ok', albumList: {} }, '{}', 'albumList').ok).toBe(true);
    expect(validate({ status: 'ok', albumList: { album: [] } }, '{}', 'albumList').ok).toBe(true);
    expect(validate({ status: 'ok', album: { id: 'al-1' } }, '{}', 'album').ok).toBe(true);
  });

  it('accepts a bare ok envelope when no payload is expected', () => {
    expect(validate({ status: 'ok' }, '{}', 'none')).toEqual({ ok: true, value: undefined });
  });
});
