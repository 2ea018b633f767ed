import { z } from 'zod';
import {
  ConfigurationOptionsSchema,
  ExpressionSymbolsSchema,
  ListDelimiterHandlerTypeSchema,
  LogLevelSchema,
} from './config/index.js';

export * from './config/index.js';

/** Options as accepted from callers (defaults not yet applied) */
export type ConfigurationOptionsInput = z.input<typeof ConfigurationOptionsSchema>;
/** Options after validation, with defaults applied */
export type ConfigurationOptions = z.infer<typeof ConfigurationOptionsSchema>;
export type ExpressionSymbolsInput = z.input<typeof ExpressionSymbolsSchema>;
export type ListDelimiterHandlerType = z.infer<typeof ListDelimiterHandlerTypeSchema>;
export type LogLevelName = z.infer<typeof LogLevelSchema>;
