import { z } from 'zod';

export const ytDlpFormatSchema = z.object({
  format_id: z.string(),
  url: z.string().nullish(),
  ext: z.string().nullish(),
  width: z.number().nullish(),
  height: z.number().nullish(),
  fps: z.number().nullish(),
  vcodec: z.string().nullish(),
  acodec: z.string().nullish(),
  tbr: z.number().nullish(),
  abr: z.number().nullish(),
  filesize: z.number().nullish(),
  filesize_approx: z.number().nullish(),
});

/**
 * Salida de `yt-dlp -j` para un único video
 */
export const ytDlpInfoSchema = z.object({
  id: z.string(),
  title: z.string().nullish(),
  duration: z.number().nullish(),
  formats: z.array(ytDlpFormatSchema).default([]),
});

export type YtDlpFormat = z.infer<typeof ytDlpFormatSchema>;
export type YtDlpInfo = z.infer<typeof ytDlpInfoSchema>;
