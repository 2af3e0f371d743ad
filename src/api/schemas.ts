import { z } from "zod";

export const ScrapeBodySchema = z.object({
  url: z.string().url(),
  crawl: z.boolean().default(false),
  max_pages: z.number().int().positive().max(1000).default(10),
});

export const PagesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const PageQuerySchema = z
  .object({
    url: z.string().min(1).optional(),
    id: z.string().min(1).optional(),
  })
  .refine((q) => q.url || q.id, { message: "Provide url or id" });

export const ExtractBodySchema = z
  .object({
    url: z.string().url().optional(),
    id: z.string().min(1).optional(),
    ocr: z.boolean().default(false),
    persist: z.boolean().default(true),
  })
  .refine((b) => b.url || b.id, { message: "Provide url or id" });

export const ConversionsQuerySchema = z.object({
  page_url: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(1000),
});

export const ConversionItemSchema = z.object({
  source: z.string().trim().min(1),
  target: z.string().trim().min(1),
  rate: z.number().positive().finite(),
  text: z.string().optional(),
});

export const ConversionsUpsertSchema = z.object({
  page_url: z.string().min(1),
  page_title: z.string().optional(),
  items: z.array(ConversionItemSchema),
});
