import { z } from "zod";

export const marketplaceCredentialsSchema = z.object({
  clientId: z.string().min(1, "Marketplace client ID is required"),
  clientSecret: z.string().min(1, "Marketplace client secret is required"),
});

/** Operator input for registering a shop. */
export const shopInputSchema = z.object({
  name: z.string().trim().min(1, "Shop name is required"),
  shopUrl: z.string().url("Must be a full URL").optional(),
  clientId: z.string().trim().min(1, "Client ID is required"),
  clientSecret: z.string().trim().min(1, "Client secret is required"),
  userId: z
    .string()
    .trim()
    .regex(/^\d+$/, "Remote user ID must be numeric"),
  isActive: z.boolean().default(true),
});

export const listingInputSchema = z.object({
  listingId: z.string().min(1),
  title: z.string().default(""),
  price: z.coerce.number().nonnegative().default(0),
  url: z.string().default(""),
  imageUrl: z.string().default(""),
  location: z.string().default(""),
  description: z.string().default(""),
  category: z.string().default(""),
});

export type MarketplaceCredentials = z.infer<typeof marketplaceCredentialsSchema>;
export type ShopInput = z.input<typeof shopInputSchema>;
export type ListingInput = z.input<typeof listingInputSchema>;
