import { log } from './logger.js';
import { addSong } from './playlist.js';
import { call } from './subsonic/call.js';
import { expectAlbum, expectAlbumList } from './subsonic/validate.js';
import { ok, Result } from './subsonic/result.js';
import type { OrchestrationError } from './subsonic/errors.js';
import type { SubsonicSession } from './subsonic/transport.js';

export type PopulateSummary = {
  albums:number,
  songs:number,
};

export async function randomList(session:SubsonicSession, size:number):Promise<Result<SubsonicAlbumList, OrchestrationError>> {
  return call(session, 'fetching random album list', 'getAlbumList', [['type', 'random'], ['size', size.toString()]], expectAlbumList);
}

export async function getAlbum(session:SubsonicSession, id:string):Promise<Result<SubsonicAlbum, OrchestrationError>> {
  return call(session, `fetching album ${id}`, 'getAlbum', [['id', id]], expectAlbum);
}

// strictly one request at a time; the first failure anywhere stops everything after it
export async function populate(session:SubsonicSession, playlistId:string, sampleSize:number):Promise<Result<PopulateSummary, OrchestrationError>> {
  const list = await randomList(session, sampleSize);
  if (!list.ok) { return list; }

  const albums = list.value.album ?? [];
  log('info', [`Got ${albums.length} random albums`]);
  const summary:PopulateSummary = { albums: 0, songs: 0 };

  for (const entry of albums) {
    const album = await getAlbum(session, entry.id);
    if (!album.ok) { return album; }

    for (const song of album.value.song ?? []) {
      const added = await addSong(session, playlistId, song.id);
      if (!added.ok) { return added; }
      summary.songs++;
    }
    summary.albums++;
  }
  return ok(summary);
}
