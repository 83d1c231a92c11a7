import { z } from "zod";

const symbol = z
  .string()
  .refine((value) => [...value].length === 1, "must be a single character");
const token = z.string().regex(/^\S+$/, "must be a non-empty token without whitespace");
const extension = z.string().regex(/^[A-Za-z0-9_-]+$/, "must be a bare extension without a dot");

export const dialectOverridesSchema = z
  .object({
    leftWall: symbol.optional(),
    rightWall: symbol.optional(),
    blank: symbol.optional(),
    wildcard: symbol.optional(),
    commentDelimiter: symbol.optional(),

    directions: z
      .object({ left: token.optional(), right: token.optional(), stay: token.optional() })
      .strict()
      .optional(),
    headers: z
      .object({ infinite: token.optional(), sipser: token.optional() })
      .strict()
      .optional(),

    // State labels
    haltPrefix: token.optional(),
    simPrefix: z.string().regex(/^\S*$/, "must not contain whitespace").optional(),
    startState: token.optional(),
  })
  .strict();

export const converterConfigSchema = z
  .object({
    dialect: dialectOverridesSchema.optional(),

    // CLI paths
    defaultInputPath: z.string().min(1).optional(),
    inputExtension: extension.optional(),
    outputExtension: extension.optional(),
  })
  .strict();
