import { OrchestrationError } from './errors.js';
import { request, Endpoint, QueryParams, SubsonicReply, SubsonicSession } from './transport.js';
import { ok, err, Result } from './result.js';
import type { ValidationError } from './errors.js';

// transport then validation for a single step; whichever fails first is tagged with the step
export async function call<T>(
  session:SubsonicSession,
  step:string,
  endpoint:Endpoint,
  params:QueryParams,
  check:(reply:SubsonicReply) => Result<T, ValidationError>,
):Promise<Result<T, OrchestrationError>> {
  const reply = await request(session, endpoint, params);
  if (!reply.ok) { return err(new OrchestrationError(step, reply.error)); }
  const checked = check(reply.value);
  if (!checked.ok) { return err(new OrchestrationError(step, checked.error)); }
  return ok(checked.value);
}
