import { ValidationError } from './errors.js';
import { ok, err, Result } from './result.js';
import type { SubsonicReply } from './transport.js';

export type ExpectedPayload = SubsonicPayloadKind | 'none';

// the status flag comes first; payload fields of a failed response are never looked at
export function expectOk(reply:SubsonicReply):Result<void, ValidationError> {
  if (reply.envelope.status !== 'ok') {
    return err(ValidationError.notOk(reply.body, reply.envelope.error));
  }
  return ok(undefined);
}

// only the wrapper has to be there, an empty list inside it is fine
function present<T>(payload:T | undefined, kind:SubsonicPayloadKind, body:string):Result<T, ValidationError> {
  return payload === undefined ? err(ValidationError.missingPayload(kind, body)) : ok(payload);
}

export function expectAlbum(reply:SubsonicReply):Result<SubsonicAlbum, ValidationError> {
  const status = expectOk(reply);
  if (!status.ok) { return status; }
  return present(reply.envelope.album, 'album', reply.body);
}

export function expectAlbumList(reply:SubsonicReply):Result<SubsonicAlbumList, ValidationError> {
  const status = expectOk(reply);
  if (!status.ok) { return status; }
  return present(reply.envelope.albumList, 'albumList', reply.body);
}

export function expectPlaylist(reply:SubsonicReply):Result<SubsonicPlaylist, ValidationError> {
  const status = expectOk(reply);
  if (!status.ok) { return status; }
  return present(reply.envelope.playlist, 'playlist', reply.body);
}

export function expectPlaylists(reply:SubsonicReply):Result<SubsonicPlaylists, ValidationError> {
  const status = expectOk(reply);
  if (!status.ok) { return status; }
  return present(reply.envelope.playlists, 'playlists', reply.body);
}

export function validate(envelope:SubsonicResponse, body:string, expected:ExpectedPayload):Result<void, ValidationError> {
  const reply = { envelope, body };
  let checked:Result<unknown, ValidationError>;
  switch (expected) {
    case 'album': checked = expectAlbum(reply); break;
    case 'albumList': checked = expectAlbumList(reply); break;
    case 'playlist': checked = expectPlaylist(reply); break;
    case 'playlists': checked = expectPlaylists(reply); break;
    default: checked = expectOk(reply); break; // 'none': delete/update only return the bare envelope
  }
  return checked.ok ? ok(undefined) : checked;
}
