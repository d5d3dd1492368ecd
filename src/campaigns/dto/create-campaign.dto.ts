import { z } from 'zod';

export const CreateCampaignBodySchema = z
  .object({
    name: z.string().trim().min(1).max(80).optional().default('Untitled campaign'),
  })
  .default({});

export type CreateCampaignBody = z.infer<typeof CreateCampaignBodySchema>;
