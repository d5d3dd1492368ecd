import { z } from 'zod';

const budget = z.coerce.number().int().min(64).max(32000).default(2000);

export const GetContextQuerySchema = z.object({ budget });

export type GetContextQuery = z.infer<typeof GetContextQuerySchema>;

export const NarrationBodySchema = z.object({ budget }).default({});

export type NarrationBody = z.infer<typeof NarrationBodySchema>;
