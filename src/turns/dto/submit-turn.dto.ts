import { z } from 'zod';

const expectedTurnNo = z.number().int().min(0).optional();

export const SubmitTurnBodySchema = z.object({
  text: z.string().trim().min(1).max(2000),
  expectedTurnNo,
});

export type SubmitTurnBody = z.infer<typeof SubmitTurnBodySchema>;

export const ConfirmFactBodySchema = z.object({
  field: z.string().trim().min(1).max(40),
  value: z.string().trim().min(1).max(200),
  expectedTurnNo,
});

export type ConfirmFactBody = z.infer<typeof ConfirmFactBodySchema>;

export const UndoBodySchema = z
  .object({ expectedTurnNo })
  .default({});

export type UndoBody = z.infer<typeof UndoBodySchema>;
