import { z } from 'zod';

export const rawValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const rawPayloadSchema = z.record(rawValueSchema);

export const pointTableInputSchema = z.object({
  main: rawPayloadSchema,
  equipment: z.array(rawPayloadSchema)
});

export const tableKindSchema = z.enum(['plc', 'hmi-bool', 'hmi-real', 'fat']);

export const tableRequestSchema = z
  .object({
    kind: tableKindSchema,
    template: z.string().min(1).optional(),
    includeReserved: z.boolean().optional()
  })
  .refine(request => !request.includeReserved || request.kind === 'plc' || request.kind === 'fat', {
    message: 'includeReserved applies to plc and fat tables only',
    path: ['includeReserved']
  });

export const generateSchema = pointTableInputSchema.extend({
  tables: z.array(tableRequestSchema).min(1)
});

export const plcopenExportSchema = pointTableInputSchema.extend({
  template: z.string().min(1).optional(),
  variableListName: z.string().min(1).optional(),
  includeReserved: z.boolean().optional()
});

export type GenerateBody = z.infer<typeof generateSchema>;
export type PlcopenExportBody = z.infer<typeof plcopenExportSchema>;
