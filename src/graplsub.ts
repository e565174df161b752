import { log, setDebugMode } from './logger.js';
import { populate } from './album.js';
import { recreatePlaylist } from './playlist.js';
import { deriveCredentials } from './subsonic/credentials.js';
import { createHttp, createSession } from './subsonic/transport.js';
import type { AxiosInstance } from 'axios';
import type { GraplsubConfig } from './config.js';

// returns the process exit code
export async function run(config:GraplsubConfig, http:AxiosInstance = createHttp()):Promise<number> {
  setDebugMode(config.debug);
  const session = createSession(config.baseUrl, deriveCredentials(config.user, config.password), http);

  const playlist = await recreatePlaylist(session, config.playlistName);
  if (!playlist.ok) {
    log('error', [playlist.error.message]);
    return 1;
  }

  const populated = await populate(session, playlist.value, config.numAlbums);
  if (!populated.ok) {
    log('error', [populated.error.message]);
    return 1;
  }

  log('info', [`Added ${populated.value.songs} songs from ${populated.value.albums} albums to ${config.playlistName}`]);
  return 0;
}
