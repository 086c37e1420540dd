import { CartLine, OrderLine, Product } from '../models.js';

export interface ResolvedLine {
  product: Product;
  quantity: number;
  variant?: string;
}

export interface PricedLines {
  lines: OrderLine[];
  total: number;
}

export interface IPricingStrategy {
  // prices are taken from the product as resolved at commit time
  priceLines(resolved: readonly ResolvedLine[]): PricedLines;
  estimateCart(lines: readonly CartLine[]): number;
}

// standard pricing - whole currency units, no tax or discounts
export class StandardPricingStrategy implements IPricingStrategy {
  priceLines(resolved: readonly ResolvedLine[]): PricedLines {
    const lines = resolved.map(({ product, quantity, variant }): OrderLine => {
      const line: OrderLine = {
        productId: product.id,
        productName: product.name,
        quantity,
        unitPrice: product.price,
        lineTotal: product.price * quantity,
      };
      if (variant !== undefined) line.variant = variant;
      return line;
    });

    return {
      lines,
      total: lines.reduce((sum, line) => sum + line.lineTotal, 0),
    };
  }

  estimateCart(lines: readonly CartLine[]): number {
    return lines.reduce((sum, line) => sum + line.unitPrice * line.quantity, 0);
  }
}
