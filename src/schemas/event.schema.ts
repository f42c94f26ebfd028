import { z } from 'zod';

import { EVENT_TYPE_PATTERN, MAX_EVENT_TYPE_LENGTH } from './event-type.pattern';
import { parseOccurredAt } from './occurred-at.pattern';

const OCCURRED_AT_MESSAGE = 'occurred_at must be a YYYY-MM-DD HH:MM:SS timestamp';

export const EVENT_FIELDS = ['type', 'value', 'occurred_at'] as const;

export const eventTypeSchema = z
  .string({ error: 'type must be a non-empty string' })
  .min(1, 'type must be a non-empty string')
  .max(MAX_EVENT_TYPE_LENGTH, `type must be at most ${MAX_EVENT_TYPE_LENGTH} characters`)
  .regex(EVENT_TYPE_PATTERN, 'type must not contain control characters');

export const eventMessageSchema = z
  .object({
    type: eventTypeSchema,
    value: z.number({ error: 'value must be a finite number' }),
    occurred_at: z.string({ error: OCCURRED_AT_MESSAGE }).transform((value, ctx) => {
      const occurredAt = parseOccurredAt(value);

      if (!occurredAt) {
        ctx.issues.push({ code: 'custom', message: OCCURRED_AT_MESSAGE, input: value });

        return z.NEVER;
      }

      return occurredAt;
    }),
  })
  .transform(({ type, value, occurred_at }) => ({ type, value, occurredAt: occurred_at }));
