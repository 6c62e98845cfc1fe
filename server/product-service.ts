import type { Product } from "../drizzle/schema";
import type { ProductRepository } from "./db";

export interface ProductView {
  id: string;
  name: string;
  description: string | null;
  /** Whole currency units, e.g. 19.5 for 1950 cents. */
  price: number;
  category: string | null;
  inStock: boolean;
}

export interface ProductFilter {
  /** Case-insensitive match on the category. */
  category?: string;
  inStockOnly?: boolean;
}

function toProductView(p: Product): ProductView {
  return {
    id: p.id,
    name: p.name,
    description: p.description,
    price: p.priceCents / 100,
    category: p.category,
    inStock: p.inStock,
  };
}

/** Read side of the product catalogue shown next to the webinar pages. */
export class ProductService {
  constructor(private readonly products: ProductRepository) {}

  async listProducts(filter: ProductFilter = {}): Promise<ProductView[]> {
    const category = filter.category?.trim().toLowerCase();
    const rows = await this.products.listProducts();
    return rows
      .filter((p) => !filter.inStockOnly || p.inStock)
      .filter((p) => !category || p.category?.toLowerCase() === category)
      .map(toProductView);
  }
}
