import { z } from 'zod';

export const zoneSchema = z
  .object({
    id: z.union([z.number(), z.string()]),
    name: z.string().nullish(),
    type: z.string().nullish()
  })
  .passthrough();

export const zonesSchema = z.array(zoneSchema);

export type TadoZone = z.infer<typeof zoneSchema>;
