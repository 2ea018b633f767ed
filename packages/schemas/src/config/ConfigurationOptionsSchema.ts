import { z } from 'zod';
import { ExpressionSymbolsSchema } from './ExpressionSymbolsSchema.js';
import {
  ListDelimiterHandlerTypeSchema,
  ListDelimiterSchema,
} from './ListDelimiterSchema.js';

export const ConfigurationOptionsSchema = z
  .object({
    listDelimiter: ListDelimiterSchema.default(','),
    listDelimiterHandler: ListDelimiterHandlerTypeSchema.default('default'),
    throwExceptionOnMissing: z.boolean().default(false),
    enableSubstitutionInVariables: z.boolean().default(false),
    expressionSymbols: ExpressionSymbolsSchema.optional(),
  })
  .strict();
