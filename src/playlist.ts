import { log } from './logger.js';
import { call } from './subsonic/call.js';
import { expectOk, expectPlaylist, expectPlaylists } from './subsonic/validate.js';
import { ok, Result } from './subsonic/result.js';
import type { OrchestrationError } from './subsonic/errors.js';
import type { SubsonicSession } from './subsonic/transport.js';

// first match wins, in whatever order the server listed them
export function findByName(playlists:SubsonicPlaylists, name:string):SubsonicPlaylist | undefined {
  return playlists.playlist?.find((playlist) => playlist.name === name);
}

// delete-then-create rather than emptying the old one
// there's no rollback: if the create fails after a delete, the run ends with no playlist at all
export async function recreatePlaylist(session:SubsonicSession, name:string):Promise<Result<string, OrchestrationError>> {
  const listed = await call(session, 'listing playlists', 'getPlaylists', [], expectPlaylists);
  if (!listed.ok) { return listed; }

  const existing = findByName(listed.value, name);
  if (existing) {
    log('info', [`Deleting existing playlist ${name} (${existing.id})`]);
    const deleted = await call(session, `deleting playlist ${existing.id}`, 'deletePlaylist', [['id', existing.id]], expectOk);
    if (!deleted.ok) { return deleted; }
  }

  const created = await call(session, `creating playlist ${name}`, 'createPlaylist', [['name', name]], expectPlaylist);
  if (!created.ok) { return created; }
  log('info', [`Created playlist ${name} (${created.value.id})`]);
  return ok(created.value.id);
}

export async function addSong(session:SubsonicSession, playlistId:string, songId:string):Promise<Result<void, OrchestrationError>> {
  return call(session, `adding song ${songId} to playlist ${playlistId}`, 'updatePlaylist', [['playlistId', playlistId], ['songIdToAdd', songId]], expectOk);
}
