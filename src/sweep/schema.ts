/**
 * Sweep definition schema.
 *
 * A sweep names candidate values per parameter ("dimensions") and values
 * shared by every combination ("fixed"). The parameter writer enumerates
 * the Cartesian product of the dimensions and materializes one parameter
 * set per combination.
 *
 *   {
 *     "dimensions": {
 *       "n_units": [0, 5, 10],
 *       "area": ["VISp", "AUDp"],
 *       "session_id": ["a", "b", "c"]
 *     },
 *     "fixed": { "logging_level": "info" }
 *   }
 */

import { z } from "zod";

export const SweepValueSchema = z.union([z.string(), z.number(), z.boolean()]);
export type SweepValue = z.infer<typeof SweepValueSchema>;

/** Identity of a value within a dimension: 5 and "5" are different. */
export function sweepValueKey(value: SweepValue): string {
  return `${typeof value}:${String(value)}`;
}

export const SweepDefinitionSchema = z
  .object({
    dimensions: z
      .record(z.string().min(1), z.array(SweepValueSchema).min(1))
      .describe("Candidate values per parameter"),
    fixed: z
      .record(z.string().min(1), SweepValueSchema)
      .default({})
      .describe("Values shared by every combination"),
  })
  .strict()
  .superRefine((definition, ctx) => {
    const names = Object.keys(definition.dimensions);

    if (names.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["dimensions"],
        message: "a sweep needs at least one dimension",
      });
    }

    for (const name of names) {
      const seen = new Set<string>();
      for (const value of definition.dimensions[name] ?? []) {
        const key = sweepValueKey(value);
        if (seen.has(key)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["dimensions", name],
            message: `duplicate value ${JSON.stringify(value)}`,
          });
        }
        seen.add(key);
      }

      if (name in definition.fixed) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["fixed", name],
          message: `"${name}" is both a dimension and a fixed value`,
        });
      }
    }
  });

export type SweepDefinition = z.infer<typeof SweepDefinitionSchema>;
export type SweepDefinitionInput = z.input<typeof SweepDefinitionSchema>;
