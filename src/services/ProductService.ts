import { readFileSync } from 'fs';
import path from 'path';
import { Product, ProductCatalogSchema } from '../shop/shopSchemas';

export const DEFAULT_CATALOG_PATH = path.join(__dirname, '../../data/products.json');

// Read-only product catalog the storefront offers; the cart accepts any product id.
export class ProductService {
  private products: Product[];

  constructor(products: Product[]) {
    this.products = products;
  }

  // Loads and validates the catalog file once at startup.
  static fromFile(file: string = DEFAULT_CATALOG_PATH): ProductService {
    const raw: unknown = JSON.parse(readFileSync(file, 'utf8'));
    return new ProductService(ProductCatalogSchema.parse(raw));
  }

  getProducts(): { products: Product[] } {
    return { products: this.products.map(p => ({ ...p })) };
  }
}
