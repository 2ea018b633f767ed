import { z } from 'zod';

// A single delimiter character, or null to disable list splitting
export const ListDelimiterSchema = z
  .string()
  .length(1, 'List delimiter must be a single character')
  .refine((c) => c !== '\\', {
    message: 'Backslash is reserved as the escape character',
  })
  .nullable();

export const ListDelimiterHandlerTypeSchema = z.enum([
  'default',
  'legacy',
  'disabled',
]);
