import { Injectable } from '@nestjs/common';
import { IdResolution, ThumbnailUrls } from '../interfaces/video-info.interface';
import { InvalidVideoIdException } from '../exceptions/video.exceptions';

const THUMBNAIL_BASE = 'https://img.youtube.com/vi';

@Injectable()
export class VideoUrlService {
  // El orden importa: gana el primer patrón que coincide
  private readonly patterns: RegExp[] = [
    /(?:https?:\/\/)?(?:(?:www|m|music)\.)?(?:youtube\.com\/(?:watch\?v=|embed\/|v\/|shorts\/|live\/)|youtu\.be\/)([A-Za-z0-9_-]{11})/,
    /(?:v=|v\/|vi=|vi\/|youtu\.be\/|embed\/|shorts\/)([A-Za-z0-9_-]{11})/,
    /^([A-Za-z0-9_-]{11})$/,
  ];

  /**
   * Intenta extraer el ID del video de una URL o de un ID suelto
   */
  resolve(input: string): IdResolution {
    const candidate = input.trim();

    for (const pattern of this.patterns) {
      const match = candidate.match(pattern);
      if (match && match[1]) {
        return { ok: true, videoId: match[1] };
      }
    }

    return { ok: false, reason: 'invalid-format' };
  }

  /**
   * Extrae el ID del video o lanza un error de cliente
   */
  extractVideoId(input: string): string {
    const resolution = this.resolve(input);
    if (!resolution.ok) {
      throw new InvalidVideoIdException();
    }
    return resolution.videoId;
  }

  watchUrl(videoId: string): string {
    return `https://www.youtube.com/watch?v=${videoId}`;
  }

  embedUrl(videoId: string): string {
    return `https://www.youtube.com/embed/${videoId}`;
  }

  thumbnailUrls(videoId: string): ThumbnailUrls {
    return {
      default: `${THUMBNAIL_BASE}/${videoId}/default.jpg`,
      medium: `${THUMBNAIL_BASE}/${videoId}/mqdefault.jpg`,
      high: `${THUMBNAIL_BASE}/${videoId}/hqdefault.jpg`,
      standard: `${THUMBNAIL_BASE}/${videoId}/sddefault.jpg`,
      maxres: `${THUMBNAIL_BASE}/${videoId}/maxresdefault.jpg`,
    };
  }

  /**
   * Miniatura usada cuando no se pudo obtener ningún metadato
   */
  placeholderThumbnailUrl(videoId: string): string {
    return `${THUMBNAIL_BASE}/${videoId}/0.jpg`;
  }
}
