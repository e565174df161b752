import crypto from 'crypto';

export type SessionCredentials = {
  readonly user:string,
  readonly salt:string,
  readonly token:string,
};

export type RandomSource = (size:number) => Buffer;

// subsonic token auth:
// 3 random bytes as 6 hex digits for the salt, then md5(password + salt)
// the salt only has to change between runs, it isn't a secret
export function hashToken(password:string, salt:string):string {
  return crypto.createHash('md5').update(`${password}${salt}`).digest('hex');
}

export function deriveCredentials(user:string, password:string, random:RandomSource = crypto.randomBytes):SessionCredentials {
  const salt = random(3).toString('hex');
  return Object.freeze({ user, salt, token: hashToken(password, salt) });
}
