import http from 'http';
import https from 'https';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { log, logDebug } from '../logger.js';
import { envelopeSchema } from './schema.js';
import { TransportError } from './errors.js';
import { ok, err, Result } from './result.js';
import type { SessionCredentials } from './credentials.js';

export const API_VERSION = '1.14.0';
export const CLIENT_ID = 'graplsub';
export const USER_AGENT = 'graplsub/0.1.0';

export const REQUEST_TIMEOUT = 5000;
const CLIENT_TIMEOUT = 30000;
const POOL_IDLE_TIMEOUT = 90000;
const POOL_MAX_IDLE = 10;

export type Endpoint = 'getPlaylists' | 'deletePlaylist' | 'createPlaylist' | 'getAlbumList' | 'getAlbum' | 'updatePlaylist';

// call-specific query parameters, kept as pairs so the order on the wire never moves
export type QueryParams = Array<[string, string]>;

export type SubsonicSession = {
  baseUrl:string,
  credentials:SessionCredentials,
  http:AxiosInstance,
  apiVersion:string,
  clientId:string,
};

export type SubsonicReply = {
  envelope:SubsonicResponse,
  body:string,
};

// one client for the whole run, so connections get reused between the sequential calls
export function createHttp():AxiosInstance {
  return axios.create({
    timeout: CLIENT_TIMEOUT,
    headers: {
      'Accept': 'application/json',
      'User-Agent': USER_AGENT,
    },
    httpAgent: new http.Agent({ keepAlive: true, maxFreeSockets: POOL_MAX_IDLE, timeout: POOL_IDLE_TIMEOUT }),
    httpsAgent: new https.Agent({ keepAlive: true, maxFreeSockets: POOL_MAX_IDLE, timeout: POOL_IDLE_TIMEOUT }),
  });
}

export function createSession(baseUrl:string, credentials:SessionCredentials, client:AxiosInstance = createHttp()):SubsonicSession {
  return {
    baseUrl: baseUrl.replace(/\/+$/, ''),
    credentials,
    http: client,
    apiVersion: API_VERSION,
    clientId: CLIENT_ID,
  };
}

export function buildUrl(session:SubsonicSession, endpoint:Endpoint, params:QueryParams = []):URL {
  const url = new URL(`${session.baseUrl}/rest/${endpoint}`);
  const query = new URLSearchParams([
    ['u', session.credentials.user],
    ['t', session.credentials.token],
    ['s', session.credentials.salt],
    ['f', 'json'],
    ['v', session.apiVersion],
    ['c', session.clientId],
    ...params,
  ]);
  url.search = query.toString();
  return url;
}

// what's safe to put in an error message or a log line
export function reportableUrl(url:URL):string {
  return `${url.origin}${url.pathname}`;
}

export function parseEnvelope(body:string):Result<SubsonicResponse, string> {
  let json:unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }
  const { error, value } = envelopeSchema.validate(json);
  if (error) { return err(error.message); }
  return ok(value['subsonic-response']);
}

function describeFailure(error:unknown):string {
  if (axios.isAxiosError(error)) {
    return error.code ? `${error.message} (${error.code})` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export async function request(session:SubsonicSession, endpoint:Endpoint, params:QueryParams = []):Promise<Result<SubsonicReply, TransportError>> {
  const url = buildUrl(session, endpoint, params);
  log('fetch', [endpoint, ...params.map(([key, value]) => `${key}=${value}`)]);

  let response:AxiosResponse<unknown>;
  try {
    response = await session.http.get<unknown>(url.toString(), {
      timeout: REQUEST_TIMEOUT,
      responseType: 'text',
      transformResponse: [(data:unknown) => data],
      validateStatus: () => true,
    });
  } catch (error) {
    return err(TransportError.network(describeFailure(error)));
  }

  if (response.status === 404) {
    return err(TransportError.notFound(reportableUrl(url)));
  }
  if (response.status < 200 || response.status > 299) {
    return err(TransportError.http(response.status, reportableUrl(url)));
  }

  const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data) ?? '';
  logDebug(`${endpoint} returned ${body.length} bytes`);
  const envelope = parseEnvelope(body);
  if (!envelope.ok) {
    return err(TransportError.malformedResponse(body, envelope.error));
  }
  return ok({ envelope: envelope.value, body });
}
