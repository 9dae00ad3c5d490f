/**
 * Payload shapes of the Fix Price buyer API
 *
 * Only the fields the crawler reads are declared; anything else is stripped,
 * except on variants where the extra keys become product metadata.
 */

import { z } from "zod";

const priceValue = z.union([z.number(), z.string()]);

const imageSchema = z.object({
  src: z.string(),
});

const brandSchema = z.object({
  title: z.string().nullish(),
});

const specialPriceSchema = z.object({
  price: priceValue,
});

export const listingItemSchema = z.object({
  sku: z.union([z.string(), z.number()]).nullish(),
  title: z.string().nullish(),
  url: z.string().nullish(),
  price: priceValue.nullish(),
  specialPrice: specialPriceSchema.nullish(),
  brand: brandSchema.nullish(),
  image: z.string().nullish(),
  images: z.array(imageSchema).nullish(),
  variantCount: z.number().int().nullish(),
});

export const listingPageSchema = z.array(listingItemSchema);

const variantSchema = z
  .object({
    price: priceValue,
    count: z.number().nullish(),
  })
  .passthrough();

const propertySchema = z.object({
  title: z.string().nullish(),
  value: z.union([z.string(), z.number()]).nullish(),
});

export const detailSchema = z.object({
  sku: z.union([z.string(), z.number()]).nullish(),
  title: z.string().nullish(),
  url: z.string().nullish(),
  description: z.string().nullish(),
  videoLink: z.string().nullish(),
  brand: brandSchema.nullish(),
  specialPrice: specialPriceSchema.nullish(),
  images: z.array(imageSchema).nullish(),
  variants: z.array(variantSchema).min(1),
  properties: z.array(propertySchema).nullish(),
});

export const cityListSchema = z.array(
  z.object({
    id: z.union([z.number(), z.string()]).nullish(),
    name: z.string().nullish(),
  }),
);

export interface MenuItem {
  alias: string;
  title: string;
  items?: MenuItem[] | null;
}

export const menuSchema: z.ZodType<MenuItem[], z.ZodTypeDef, unknown> =
  z.array(
    z.lazy(() =>
      z.object({
        alias: z.string(),
        title: z.string(),
        items: menuSchema.nullish(),
      }),
    ),
  );

export type ListingItem = z.infer<typeof listingItemSchema>;
export type ProductDetail = z.infer<typeof detailSchema>;
