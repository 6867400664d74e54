import { z } from "zod";

export const SelectableTypeSchema = z.enum(["act", "judgment", "doc", "authority-regulation"]);

const positiveInt = z.number().int().positive();

/** Shape of the optional JSON config file. Every key is optional. */
export const ConfigFileSchema = z
  .object({
    baseUrl: z.string().url(),
    userAgent: z.string().min(1),
    ignoreHttpsErrors: z.boolean(),
    outputDir: z.string().min(1),
    sleepSeconds: z.number().min(0),
    maxRetries: z.number().int().min(0),
    backoffMs: z.number().int().min(0),
    requestTimeoutMs: positiveInt,
    langAndVersion: z.string().min(1),
    pageLimit: positiveInt,
    maxPages: positiveInt,
    types: z.array(SelectableTypeSchema).min(1),
    years: positiveInt,
    yearOverrides: z
      .object({
        act: positiveInt,
        judgment: positiveInt,
        doc: positiveInt,
        "authority-regulation": positiveInt,
      })
      .partial(),
    companions: z
      .object({
        pdf: z.boolean(),
        zip: z.boolean(),
        media: z.boolean(),
      })
      .partial(),
    logLevel: z.enum(["debug", "info", "warn", "error"]),
  })
  .partial()
  .strict();

