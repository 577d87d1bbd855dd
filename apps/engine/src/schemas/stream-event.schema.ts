import { z } from 'zod';
import type { BehaviorLabelEntry, StreamEvent } from '@fleetwatch/domain';

const optionalString = z.string().optional();

const labelSchema = z.union([
  z.string(),
  z
    .object({ label: optionalString, name: optionalString, source: optionalString })
    .transform((value): BehaviorLabelEntry => value),
]);

/** Safety stream event as delivered by the upstream telematics feed. */
export const streamEventSchema = z
  .object({
    id: z.string().min(1),
    asset: z.object({ id: optionalString, name: optionalString }).optional(),
    driver: z.object({ id: optionalString, name: optionalString }).optional(),
    location: z
      .object({
        latitude: z.number().optional(),
        longitude: z.number().optional(),
        address: z
          .object({
            street: optionalString,
            city: optionalString,
            state: optionalString,
            postalCode: optionalString,
          })
          .optional(),
      })
      .optional(),
    behaviorLabels: z.array(labelSchema).optional(),
    contextLabels: z.array(labelSchema).optional(),
    eventState: z.enum(['needsReview', 'needsCoaching', 'dismissed', 'coached']).optional(),
    startMs: z.union([z.number(), z.string()]).optional(),
    createdAtTime: optionalString,
    updatedAtTime: optionalString,
  })
  .passthrough()
  .transform((event): StreamEvent => event);
