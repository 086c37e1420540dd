import { ValidationError } from './errors/index.js';

// quantities at or below zero become 1; fractions are rejected
export function normalizeQuantity(quantity: number): number {
  if (!Number.isInteger(quantity)) {
    throw new ValidationError('Quantity must be an integer.');
  }
  return quantity > 0 ? quantity : 1;
}

// blank text ("", "  ") means absent
export function normalizeOptionalText(text: string | null | undefined): string | undefined {
  const trimmed = text?.trim();
  return trimmed ? trimmed : undefined;
}
