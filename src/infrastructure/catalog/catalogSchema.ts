import { z } from 'zod';
import { PRODUCT_CATEGORIES, Product } from '../../domain/models.js';
import { CatalogUnavailableError } from '../../domain/errors/index.js';

const productSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  category: z.enum(PRODUCT_CATEGORIES),
  price: z.number().int().nonnegative(),
  color: z.string().optional(),
  description: z.string().default(''),
  attributes: z
    .object({ sizes: z.array(z.string()).optional() })
    .passthrough()
    .default({}),
});

const catalogSchema = z.array(productSchema).superRefine((products, ctx) => {
  const ids = new Set<string>();
  const names = new Set<string>();

  products.forEach((product, index) => {
    if (ids.has(product.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'id'],
        message: `Duplicate product id '${product.id}'`,
      });
    }
    if (names.has(product.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'name'],
        message: `Duplicate product name '${product.name}'`,
      });
    }
    ids.add(product.id);
    names.add(product.name);
  });
});

export function parseCatalog(raw: unknown, source: string): Product[] {
  const result = catalogSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new CatalogUnavailableError(
      `Catalog ${source} is invalid${where}: ${issue.message}`,
      result.error
    );
  }
  return result.data;
}
