import { z } from 'zod';

const nonEmpty = z.string().min(1);

export const ExpressionSymbolsSchema = z
  .object({
    propertyDelimiter: nonEmpty.default('.'),
    escapedDelimiter: nonEmpty.nullable().default('..'),
    attributeStart: nonEmpty.default('[@'),
    attributeEnd: nonEmpty.nullable().default(']'),
    indexStart: nonEmpty.default('('),
    indexEnd: nonEmpty.default(')'),
  })
  .refine(
    (symbols) =>
      symbols.escapedDelimiter === null ||
      symbols.escapedDelimiter.includes(symbols.propertyDelimiter),
    {
      message: 'escapedDelimiter must contain the property delimiter',
      path: ['escapedDelimiter'],
    },
  )
  .refine((symbols) => symbols.indexStart !== symbols.propertyDelimiter, {
    message: 'indexStart must differ from the property delimiter',
    path: ['indexStart'],
  });
