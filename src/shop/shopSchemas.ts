// Zod provides runtime validation for request payloads.
import { z } from 'zod';
import { roundMoney } from './money';

// Upper bounds keep every cart, order and statistics sum finite.
export const MAX_PRICE = 1_000_000;
export const MAX_QUANTITY = 10_000;

// Zod schemas validate incoming REST payloads and provide inferred TS types.
export const ProductIdSchema = z.number().int().positive().safe();

// Prices are kept to 2 decimals; a value that rounds down to zero is rejected.
export const PriceSchema = z
  .number()
  .positive()
  .finite()
  .max(MAX_PRICE)
  .transform(roundMoney)
  .pipe(z.number().positive());

export const QuantitySchema = z.number().int().positive().max(MAX_QUANTITY);

export const AddToCartSchema = z.object({
  product_id: ProductIdSchema,
  name: z.string().min(1).max(200),
  price: PriceSchema,
  quantity: QuantitySchema.default(1),
});

export const UpdateCartSchema = z.object({
  product_id: ProductIdSchema,
  quantity: QuantitySchema,
});

// Path parameter for DELETE /cart/remove/:productId.
export const ProductIdParamSchema = z.coerce.number().int().positive().safe();

// An empty or missing code means "no discount".
export const CheckoutSchema = z.object({
  discount_code: z.string().max(64).nullish(),
});

export const GenerateDiscountSchema = z.object({
  session_id: z.string().min(1),
});

// Inferred input types used in the route layer.
export type AddToCartInput = z.infer<typeof AddToCartSchema>;
export type UpdateCartInput = z.infer<typeof UpdateCartSchema>;
export type CheckoutInput = z.infer<typeof CheckoutSchema>;
export type GenerateDiscountInput = z.infer<typeof GenerateDiscountSchema>;

// Catalog entries loaded from data/products.json.
export const ProductSchema = z.object({
  id: ProductIdSchema,
  name: z.string().min(1),
  price: PriceSchema,
  description: z.string(),
});

export const ProductCatalogSchema = z.array(ProductSchema);

export type Product = z.infer<typeof ProductSchema>;
