/**
 * Raw protocol schema records, validated with zod.
 *
 * These mirror the JSON payload as published; `parser.ts` turns them into
 * the immutable model in `types.ts`.
 */
import { z } from 'zod';

/** Tags accepted in a `type` field */
export const RawTypeTagSchema = z.enum(['boolean', 'integer', 'number', 'object', 'string', 'any', 'array']);

const VersionPartSchema = z.union([z.string(), z.number()]).transform(String);

/**
 * Array element descriptor
 */
export const RawItemsSchema = z.object({
  type: RawTypeTagSchema.optional(),
  $ref: z.string().optional(),
});

/**
 * Property of a type, parameter or return of a command, or event field
 */
export const RawPropertySchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  type: RawTypeTagSchema.optional(),
  $ref: z.string().optional(),
  enum: z.array(z.string()).optional(),
  items: RawItemsSchema.optional(),
  optional: z.boolean().optional(),
  experimental: z.boolean().optional(),
  deprecated: z.boolean().optional(),
});

export const RawTypeSchema = z.object({
  id: z.string(),
  description: z.string().optional(),
  type: RawTypeTagSchema,
  items: RawItemsSchema.optional(),
  enum: z.array(z.string()).optional(),
  properties: z.array(RawPropertySchema).optional(),
  experimental: z.boolean().optional(),
  deprecated: z.boolean().optional(),
});

export const RawCommandSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  experimental: z.boolean().optional(),
  deprecated: z.boolean().optional(),
  redirect: z.string().optional(),
  parameters: z.array(RawPropertySchema).optional(),
  returns: z.array(RawPropertySchema).optional(),
});

export const RawEventSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  experimental: z.boolean().optional(),
  deprecated: z.boolean().optional(),
  parameters: z.array(RawPropertySchema).optional(),
});

export const RawDomainSchema = z.object({
  domain: z.string(),
  description: z.string().optional(),
  experimental: z.boolean().optional(),
  deprecated: z.boolean().optional(),
  dependencies: z.array(z.string()).optional(),
  types: z.array(RawTypeSchema).optional(),
  commands: z.array(RawCommandSchema).optional(),
  events: z.array(RawEventSchema).optional(),
});

/**
 * Top-level payload. Domains are validated one by one so that errors can
 * name the domain they occur in.
 */
export const RawProtocolSchema = z.object({
  version: z.object({
    major: VersionPartSchema,
    minor: VersionPartSchema,
  }),
  domains: z.array(z.unknown()),
});

export type RawItems = z.infer<typeof RawItemsSchema>;
export type RawProperty = z.infer<typeof RawPropertySchema>;
export type RawType = z.infer<typeof RawTypeSchema>;
export type RawCommand = z.infer<typeof RawCommandSchema>;
export type RawEvent = z.infer<typeof RawEventSchema>;
export type RawDomain = z.infer<typeof RawDomainSchema>;

/**
 * Formats a zod issue path the way it reads in the JSON payload,
 * e.g. `types[3].properties[0].name`
 */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  let formatted = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      formatted += `[${segment}]`;
    } else {
      formatted += formatted === '' ? segment : `.${segment}`;
    }
  }
  return formatted;
}
