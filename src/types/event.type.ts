import type { z } from 'zod';

import type { eventMessageSchema } from '../schemas/event.schema';

export type Event = z.output<typeof eventMessageSchema>;
