// every protocol step hands back one of these instead of throwing,
// callers return early on the first { ok:false }
export type Result<T, E> = { ok:true, value:T } | { ok:false, error:E };

export function ok<T>(value:T):{ ok:true, value:T } {
  return { ok: true, value };
}

export function err<E>(error:E):{ ok:false, error:E } {
  return { ok: false, error };
}
