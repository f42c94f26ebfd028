import { eventTypeSchema } from '../schemas/event.schema';
import { validateWithSchema } from './schema.validator';

export function validateEventType(input: unknown): string {
  return validateWithSchema(eventTypeSchema, input, 'type');
}
