/**
 * Primitive / reusable Zod types for the AgroScheme models.
 */
import { z } from "zod";

export const NonEmptyString = z.string().trim().min(1);
export const ISODate = z.string().date();           // "YYYY-MM-DD"
export const ISODateTime = z.string().datetime({ offset: true }).or(z.string().datetime());
export const Email = z.string().email();
export const NonNegativeAmount = z.number().finite().min(0);
