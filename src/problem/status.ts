import { Kind } from '../types';

/** Kind → HTTP 状态码（一一对应） */
const STATUS_BY_KIND: Record<Kind, number> = {
  [Kind.Ok]: 200,
  [Kind.Created]: 201,
  [Kind.NoContent]: 204,
  [Kind.Accepted]: 202,
  [Kind.Error]: 500,
  [Kind.Critical]: 500,
  [Kind.Unavailable]: 503,
  [Kind.Invalid]: 400,
  [Kind.Unprocessable]: 422,
  [Kind.Forbidden]: 403,
  [Kind.Unauthorized]: 401,
  [Kind.Conflict]: 409,
  [Kind.NotFound]: 404,
  [Kind.FailedDependency]: 424,
};

export function kind_to_status(kind: Kind): number {
  return STATUS_BY_KIND[kind];
}
