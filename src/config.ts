import fs from 'fs';
import Joi from 'joi';
import { fileURLToPath, URL } from 'url';
import { log } from './logger.js';
import { ok, err, Result } from './subsonic/result.js';

export const MAX_ALBUMS = 500;
export const defaultConfigPath = fileURLToPath(new URL('../config.json', import.meta.url).toString());

export type GraplsubConfig = {
  baseUrl:string,
  user:string,
  password:string,
  playlistName:string,
  numAlbums:number,
  debug:boolean,
};

// config.json, every field optional since the environment can fill them in
type ConfigFile = {
  subsonic?: {
    endpoint_uri?:string,
    username?:string,
    password?:string,
  },
  playlist_name?:string,
  num_albums?:number,
  debug?:boolean,
};

export class ConfigError extends Error {
  constructor(message:string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const fileSchema = Joi.object<ConfigFile>({
  subsonic: Joi.object({
    endpoint_uri: Joi.string(),
    username: Joi.string(),
    password: Joi.string(),
  }),
  playlist_name: Joi.string(),
  num_albums: Joi.number(),
  debug: Joi.boolean(),
});

const configSchema = Joi.object<GraplsubConfig>({
  // joi's uri() lets through things like port 99999 that URL won't parse later
  baseUrl: Joi.string().uri({ scheme: ['http', 'https'] }).custom((value:string) => new URL(value) && value, 'WHATWG URL').default('http://localhost:4533').label('GRAPLSUB_BASE_URL'),
  user: Joi.string().required().label('GRAPLSUB_USER'),
  password: Joi.string().required().label('GRAPLSUB_PASS'),
  playlistName: Joi.string().default('graplsub_random_albums').label('GRAPLSUB_PLAYLIST_NAME'),
  numAlbums: Joi.number().integer().min(0).default(100).label('GRAPLSUB_NUM_ALBUMS'),
  debug: Joi.boolean().truthy('1', 'yes').falsy('0', 'no').default(false).label('GRAPLSUB_DEBUG'),
});

function readConfigFile(path:string):Result<ConfigFile, ConfigError> {
  if (!fs.existsSync(path)) { return ok({}); }
  let json:unknown;
  try {
    json = JSON.parse(fs.readFileSync(path, 'utf-8'));
  } catch (error) {
    return err(new ConfigError(`Could not read ${path}: ${error instanceof Error ? error.message : String(error)}`));
  }
  const { error, value } = fileSchema.validate(json);
  if (error) { return err(new ConfigError(`Invalid ${path}: ${error.message}`)); }
  return ok(value);
}

// the server won't hand out more than this many random albums in one go anyway
export function clampAlbums(requested:number):number {
  if (requested > MAX_ALBUMS) {
    log('warn', [`Album count too big (${requested}). Setting to ${MAX_ALBUMS}.`]);
    return MAX_ALBUMS;
  }
  return requested;
}

// environment wins over config.json, config.json wins over the defaults
export function loadConfig(env:NodeJS.ProcessEnv = process.env, path:string = env.GRAPLSUB_CONFIG ?? defaultConfigPath):Result<GraplsubConfig, ConfigError> {
  const file = readConfigFile(path);
  if (!file.ok) { return file; }

  const { error, value } = configSchema.validate({
    baseUrl: env.GRAPLSUB_BASE_URL ?? file.value.subsonic?.endpoint_uri,
    user: env.GRAPLSUB_USER ?? file.value.subsonic?.username,
    password: env.GRAPLSUB_PASS ?? file.value.subsonic?.password,
    playlistName: env.GRAPLSUB_PLAYLIST_NAME ?? file.value.playlist_name,
    numAlbums: env.GRAPLSUB_NUM_ALBUMS ?? file.value.num_albums,
    debug: env.GRAPLSUB_DEBUG ?? file.value.debug,
  });
  if (error) {
    return err(new ConfigError(`${error.message}. Minimum GRAPLSUB_USER and GRAPLSUB_PASS are required, see also GRAPLSUB_BASE_URL, GRAPLSUB_NUM_ALBUMS and GRAPLSUB_PLAYLIST_NAME`));
  }
  return ok({ ...value, numAlbums: clampAlbums(value.numAlbums) });
}
