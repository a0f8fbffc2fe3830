/**
 * Dashboard Module REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

const IsoDateString = Type.String({
  pattern: '^\\d{4}-\\d{2}-\\d{2}$',
  description: 'Calendar date, YYYY-MM-DD',
});

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const DateRangeQuerySchema = Type.Object(
  {
    from: Type.Optional(IsoDateString),
    to: Type.Optional(IsoDateString),
  },
  { additionalProperties: false }
);

export type DateRangeQuery = Static<typeof DateRangeQuerySchema>;

export const ChannelSectionParamsSchema = Type.Object(
  {
    channel: Type.String({ minLength: 1, description: 'facebook or google' }),
    section: Type.String({ minLength: 1, description: 'daily_roi, roll_back or violet' }),
  },
  { additionalProperties: false }
);

export type ChannelSectionParams = Static<typeof ChannelSectionParamsSchema>;

export const ChannelParamsSchema = Type.Object(
  { channel: Type.String({ minLength: 1 }) },
  { additionalProperties: false }
);

export type ChannelParams = Static<typeof ChannelParamsSchema>;

export const AgentParamsSchema = Type.Object(
  { agent: Type.String({ minLength: 1, maxLength: 64 }) },
  { additionalProperties: false }
);

export type AgentParams = Static<typeof AgentParamsSchema>;

export const RefreshCacheBodySchema = Type.Object(
  {
    group: Type.Optional(
      Type.Union([
        Type.Literal('channel'),
        Type.Literal('agent'),
        Type.Literal('ads'),
        Type.Literal('partner'),
        Type.Literal('agent-tabs'),
      ])
    ),
  },
  { additionalProperties: false }
);

export type RefreshCacheBody = Static<typeof RefreshCacheBodySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Success envelope. Payloads are plain record tables and rollups.
 */
export const DataResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Unknown(),
});

export const RefreshCacheResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    group: Type.Union([Type.String(), Type.Null()]),
    cleared: Type.Integer({ minimum: 0 }),
  }),
});

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String({ description: 'Error type' }),
  message: Type.Optional(Type.String({ description: 'Human-readable error message' })),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;
