import { z, type ZodTypeAny } from 'zod';
import { ValidationError } from '../errors.js';

export const OrderIdParam = z.coerce.number().int().positive();

/** Parse request input at the boundary; failures become a 400. */
export function parseInput<S extends ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw new ValidationError(`Invalid ${what}`, parsed.error.issues);
  return parsed.data;
}

export function parseOrderId(value: unknown): number {
  return parseInput(OrderIdParam, value, 'order id');
}
