import { Type, type Static } from '@sinclair/typebox';

/**
 * Query string accepted on gateway routes.
 * Only listings read `prefix`; other parameters are ignored. A repeated
 * `prefix` arrives as an array and is accepted.
 */
export const ObjectQuerySchema = Type.Object(
  {
    prefix: Type.Optional(Type.Union([Type.String(), Type.Array(Type.String())])),
  },
  { additionalProperties: true }
);

export type ObjectQuery = Static<typeof ObjectQuerySchema>;

/**
 * Error response body for every failure
 */
export const ErrorResponseSchema = Type.Object({
  error: Type.String(),
  status: Type.Integer(),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;

/**
 * GET /_health response
 */
export const HealthResponseSchema = Type.Object({
  status: Type.Literal('ok'),
});
