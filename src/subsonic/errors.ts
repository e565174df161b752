export type TransportErrorKind = 'network' | 'notFound' | 'http' | 'malformedResponse';

export class TransportError extends Error {
  readonly kind:TransportErrorKind;
  readonly status?:number;
  readonly url?:string; // always without the query string, that's where the credentials live
  readonly body?:string;

  private constructor(kind:TransportErrorKind, message:string, extra:{ status?:number, url?:string, body?:string } = {}) {
    super(message);
    this.name = 'TransportError';
    this.kind = kind;
    this.status = extra.status;
    this.url = extra.url;
    this.body = extra.body;
  }

  static network(detail:string):TransportError {
    return new TransportError('network', `Network error: ${detail}`);
  }

  static notFound(url:string):TransportError {
    return new TransportError('notFound', `Resource not found: ${url}`, { status: 404, url });
  }

  static http(status:number, url:string):TransportError {
    return new TransportError('http', `HTTP error ${status}: ${url}`, { status, url });
  }

  static malformedResponse(body:string, detail:string):TransportError {
    return new TransportError('malformedResponse', `Malformed response (${detail}): ${body}`, { body });
  }
}

export type ValidationErrorKind = 'notOk' | 'missingPayload';

const article:Record<SubsonicPayloadKind, string> = {
  album: 'an',
  albumList: 'an',
  playlist: 'a',
  playlists: 'a',
};

export class ValidationError extends Error {
  readonly kind:ValidationErrorKind;
  readonly payload?:SubsonicPayloadKind;
  readonly body:string;

  private constructor(kind:ValidationErrorKind, message:string, body:string, payload?:SubsonicPayloadKind) {
    super(message);
    this.name = 'ValidationError';
    this.kind = kind;
    this.body = body;
    this.payload = payload;
  }

  static notOk(body:string, serverError?:SubsonicError):ValidationError {
    const reason = serverError ? `[${serverError.code}] ${serverError.message ?? 'no message'}: ` : '';
    return new ValidationError('notOk', `Subsonic response did not have 'ok' status: ${reason}${body}`, body);
  }

  static missingPayload(payload:SubsonicPayloadKind, body:string):ValidationError {
    return new ValidationError('missingPayload', `Subsonic response was missing ${article[payload]} ${payload}: ${body}`, body, payload);
  }
}

export class OrchestrationError extends Error {
  readonly step:string;
  override readonly cause:TransportError | ValidationError;

  constructor(step:string, cause:TransportError | ValidationError) {
    super(`${step}: ${cause.message}`);
    this.name = 'OrchestrationError';
    this.step = step;
    this.cause = cause;
  }
}
