// src/config/schema.ts

import { z } from 'zod';
import { FORMAT_NAMES } from '../core/options.js';
import type { FieldSpec, StructSchema } from '../engine/types.js';

/**
 * locale-validator.yml
 *
 * - defaultLocale: locale used when a call passes '' (default 'en')
 * - locales: further supported locales
 * - prefix: catalog key prefix for rule messages
 * - aliases: report fields under their field/json/form/xml alias
 * - catalogs: catalog files, relative to the config file
 * - builtinMessages: load the packaged English messages for built-in rules
 * - formats: format checkers to register (default: all)
 */
export const validatorConfigSchema = z
  .object({
    defaultLocale: z.string().min(1).default('en'),
    locales: z.array(z.string().min(1)).default([]),
    prefix: z.string().default(''),
    aliases: z.boolean().default(false),
    catalogs: z.array(z.string().min(1)).default([]),
    builtinMessages: z.boolean().default(true),
    formats: z.array(z.enum(FORMAT_NAMES)).default([...FORMAT_NAMES]),
  })
  .strict();

export type ValidatorConfig = z.infer<typeof validatorConfigSchema>;

const fieldDefinitionSchema: z.ZodType<FieldSpec> = z.lazy(() =>
  z.union([
    z.string(),
    z
      .object({
        rules: z.string().optional(),
        field: z.string().optional(),
        json: z.string().optional(),
        form: z.string().optional(),
        xml: z.string().optional(),
        fields: z.record(z.string(), fieldDefinitionSchema).optional(),
      })
      .strict(),
  ])
);

/**
 * Struct schema file read by the CLI:
 *
 *   name: User
 *   fields:
 *     Name: required,min=3
 *     Email: { rules: required,email, json: email }
 */
export const structSchemaFileSchema: z.ZodType<StructSchema> = z.object({
  name: z.string().min(1),
  fields: z.record(z.string(), fieldDefinitionSchema),
});
