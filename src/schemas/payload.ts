import { z } from 'zod';

/**
 * Wire contract between the server-side transform and the client binding.
 *
 * The payload is an object with exactly three keys:
 * - `data`: row-major cells (JSON scalars only)
 * - `columns`: column labels
 * - `type_hints`: one hint per column (see `TYPE_HINTS`)
 *
 * `type_hints` keeps its snake_case spelling: it is the key the client widget
 * reads, not a TypeScript-side name.
 */
export const jsonScalarSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null()
]);

export type JsonScalar = z.infer<typeof jsonScalarSchema>;

export const serializedPayloadSchema = z
  .object({
    data: z.array(z.array(jsonScalarSchema)),
    columns: z.array(z.string()),
    type_hints: z.array(z.string())
  })
  .strict()
  .superRefine((payload, ctx) => {
    const width = payload.columns.length;

    if (payload.type_hints.length !== width) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['type_hints'],
        message: `Expected ${width} type hints, got ${payload.type_hints.length}`
      });
    }

    payload.data.forEach((row, index) => {
      if (row.length !== width) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['data', index],
          message: `Expected ${width} cells, got ${row.length}`
        });
      }
    });
  });

export type SerializedPayload = z.infer<typeof serializedPayloadSchema>;

/** Error shape carried by a failed output message. */
export const outputErrorSchema = z.object({
  type: z.string(),
  message: z.string()
});

export type OutputErrorInfo = z.infer<typeof outputErrorSchema>;

/**
 * One message per evaluation, as delivered to the client transport.
 * Exactly one of `value` / `error` is present.
 */
export const outputMessageSchema = z.union([
  z.object({
    id: z.string(),
    cycle: z.number().int().positive(),
    value: serializedPayloadSchema
  }),
  z.object({
    id: z.string(),
    cycle: z.number().int().positive(),
    error: outputErrorSchema
  })
]);
