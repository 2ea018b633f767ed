import { z } from 'zod';

export const LogLevelSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
  );
