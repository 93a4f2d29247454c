import { z } from 'zod';

export const CardTemplateSchema = z.object({
  name: z.string(),
  qfmt: z.string(),
  afmt: z.string(),
});

export const ModelDefinitionSchema = z
  .object({
    name: z.string(),
    fields: z.array(z.string()).min(1),
    templates: z.array(CardTemplateSchema).min(1),
    // Optional values may also arrive as null
    css: z.string().nullish().transform(value => value ?? ''),
    type: z.enum(['standard', 'cloze']).default('standard'),
    sort_field: z.number().int().min(0).default(0),
  })
  .superRefine((model, ctx) => {
    const seen = new Set<string>();
    model.fields.forEach((field, index) => {
      if (seen.has(field)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['fields', index],
          message: `Duplicate field name "${field}"`,
        });
      }
      seen.add(field);
    });
    if (model.sort_field >= model.fields.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sort_field'],
        message: `sort_field must be less than the number of fields (${model.fields.length})`,
      });
    }
  });

// The tags column is space-separated, so a tag cannot carry whitespace
const TagSchema = z
  .string()
  .min(1)
  .regex(/^\S+$/, 'Tags must not contain whitespace');

export const NoteDefinitionSchema = z.object({
  fields: z.array(z.string()),
  tags: z.array(TagSchema).nullish().transform(value => value ?? []),
  guid: z.string().min(1).nullish().transform(value => value ?? undefined),
});

export const DeckDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().nullish().transform(value => value ?? ''),
  notes: z.array(NoteDefinitionSchema),
});

export const PackageDefinitionSchema = z.object({
  decks: z.array(DeckDefinitionSchema).min(1),
  model: ModelDefinitionSchema,
  media_files: z.array(z.string().min(1)).default([]),
});

export type CardTemplateDefinition = z.infer<typeof CardTemplateSchema>;
export type ModelDefinition = z.infer<typeof ModelDefinitionSchema>;
export type NoteDefinition = z.infer<typeof NoteDefinitionSchema>;
export type DeckDefinition = z.infer<typeof DeckDefinitionSchema>;
export type PackageDefinition = z.infer<typeof PackageDefinitionSchema>;

/** Shape accepted on the wire, before defaults are filled in */
export type PackageDefinitionInput = z.input<typeof PackageDefinitionSchema>;
