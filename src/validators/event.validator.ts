import { EVENT_FIELDS, eventMessageSchema } from '../schemas/event.schema';
import { ValidationError } from '../errors/validation.error';
import { ensureObject, validateWithSchema } from './schema.validator';
import type { Event } from '../types/event.type';

const utf8 = new TextDecoder('utf-8', { fatal: true });

function decodeBody(rawBody: string | Uint8Array): string {
  if (typeof rawBody === 'string') {
    return rawBody;
  }

  try {
    return utf8.decode(rawBody);
  } catch {
    throw new ValidationError({ kind: 'malformed-encoding' }, 'message body is not valid UTF-8');
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError({ kind: 'malformed-encoding' }, 'message body is not valid JSON');
  }
}

export function validateEvent(rawBody: string | Uint8Array): Event {
  const body = ensureObject(parseJson(decodeBody(rawBody)), 'message body');

  for (const field of EVENT_FIELDS) {
    if (body[field] === undefined || body[field] === null) {
      throw new ValidationError({ kind: 'missing-field', field }, `${field} is required`);
    }
  }

  return validateWithSchema(eventMessageSchema, body);
}
