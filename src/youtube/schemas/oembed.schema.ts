import { z } from 'zod';

/**
 * Respuesta de https://www.youtube.com/oembed (solo los campos usados)
 */
export const oEmbedSchema = z.object({
  title: z.string().optional(),
  author_name: z.string().optional(),
  thumbnail_url: z.string().optional(),
});

export type OEmbedResponse = z.infer<typeof oEmbedSchema>;
