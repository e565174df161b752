import Joi from 'joi';

// structural checks on a decoded response; anything we don't read is let through
const songSchema = Joi.object<SubsonicSong>({
  id: Joi.string().allow('').required(),
}).unknown();

const albumSchema = Joi.object<SubsonicAlbum>({
  id: Joi.string().allow('').required(),
  song: Joi.array().items(songSchema),
}).unknown();

const playlistSchema = Joi.object<SubsonicPlaylist>({
  id: Joi.string().allow('').required(),
  name: Joi.string().allow('').required(),
}).unknown();

export const envelopeSchema = Joi.object<SubsonicTopLevel>({
  'subsonic-response': Joi.object<SubsonicResponse>({
    status: Joi.string().allow('').required(),
    version: Joi.string(),
    error: Joi.object<SubsonicError>({
      code: Joi.number().required(),
      message: Joi.string().allow(''),
    }).unknown(),
    album: albumSchema,
    albumList: Joi.object<SubsonicAlbumList>({
      album: Joi.array().items(albumSchema),
    }).unknown(),
    playlist: playlistSchema,
    playlists: Joi.object<SubsonicPlaylists>({
      playlist: Joi.array().items(playlistSchema),
    }).unknown(),
  }).unknown().required(),
}).unknown();
