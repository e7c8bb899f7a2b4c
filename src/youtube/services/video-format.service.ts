import { Injectable } from '@nestjs/common';
import { StreamCatalog, StreamVariant, VideoStreamInfo } from '../interfaces/video-info.interface';
import { YtDlpFormat, YtDlpInfo } from '../schemas/yt-dlp.schema';

const BYTES_PER_MEBIBYTE = 1024 * 1024;

/**
 * Convierte bytes a MiB con 2 decimales; 0 o desconocido es null
 */
export function toMebibytes(bytes: number | null | undefined): number | null {
  if (!bytes) {
    return null;
  }
  return Math.round((bytes / BYTES_PER_MEBIBYTE) * 100) / 100;
}

/**
 * Formatea segundos como "M:SS" (los minutos no se acotan a 59)
 */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const minutes = Math.floor(seconds / 60);
  const secs = seconds % 60;
  return `${minutes}:${secs.toString().padStart(2, '0')}`;
}

const byVideoQuality = (a: StreamVariant, b: StreamVariant): number =>
  (b.height ?? 0) - (a.height ?? 0) || (b.totalBitrate ?? 0) - (a.totalBitrate ?? 0);

const byAudioQuality = (a: StreamVariant, b: StreamVariant): number =>
  (b.audioBitrate ?? 0) - (a.audioBitrate ?? 0) || (b.totalBitrate ?? 0) - (a.totalBitrate ?? 0);

@Injectable()
export class VideoFormatService {

  /**
   * Normaliza un formato de yt-dlp; descarta los que no tienen URL
   */
  toVariant(format: YtDlpFormat): StreamVariant | null {
    if (!format.url) {
      return null;
    }

    return {
      formatId: format.format_id,
      ext: format.ext ?? 'unknown',
      url: format.url,
      width: format.width ?? null,
      height: format.height ?? null,
      fps: format.fps ?? null,
      vcodec: format.vcodec ?? 'none',
      acodec: format.acodec ?? 'none',
      totalBitrate: format.tbr ?? null,
      audioBitrate: format.abr ?? null,
      filesize: format.filesize ?? format.filesize_approx ?? null,
    };
  }

  /**
   * Agrupa los formatos en progresivos, solo video y solo audio,
   * ordenados de mayor a menor calidad
   */
  buildCatalog(formats: YtDlpFormat[]): StreamCatalog {
    const catalog: StreamCatalog = { progressive: [], videoOnly: [], audioOnly: [] };

    for (const format of formats) {
      const variant = this.toVariant(format);
      if (!variant) continue;

      const hasVideo = variant.vcodec !== 'none';
      const hasAudio = variant.acodec !== 'none';

      if (hasVideo && hasAudio) {
        catalog.progressive.push(variant);
      } else if (hasVideo) {
        catalog.videoOnly.push(variant);
      } else if (hasAudio) {
        catalog.audioOnly.push(variant);
      }
      // Sin video ni audio: storyboards y similares
    }

    catalog.progressive.sort(byVideoQuality);
    catalog.videoOnly.sort(byVideoQuality);
    catalog.audioOnly.sort(byAudioQuality);

    return catalog;
  }

  toStreamInfo(info: YtDlpInfo): VideoStreamInfo {
    return {
      videoId: info.id,
      title: info.title ?? null,
      durationSeconds: info.duration ?? null,
      catalog: this.buildCatalog(info.formats),
    };
  }

  /**
   * Elige una variante de una lista ya ordenada de mejor a peor.
   * Acepta "high"/"highest", "medium", "low"/"lowest" o una altura como "720p";
   * una altura sin coincidencia exacta toma la mejor variante que no la supere.
   */
  pickByQuality(sorted: StreamVariant[], quality: string): StreamVariant | undefined {
    if (sorted.length === 0) {
      return undefined;
    }

    const normalized = quality.trim().toLowerCase();

    if (normalized === 'low' || normalized === 'lowest') {
      return sorted[sorted.length - 1];
    }
    if (normalized === 'medium') {
      return sorted[Math.floor(sorted.length / 2)];
    }

    const heightMatch = normalized.match(/^(\d{3,4})p$/);
    if (heightMatch) {
      const target = parseInt(heightMatch[1], 10);
      return sorted.find(v => v.height === target)
        ?? sorted.find(v => (v.height ?? 0) <= target)
        ?? sorted[sorted.length - 1];
    }

    return sorted[0];
  }

  qualityLabel(variant: StreamVariant): string | null {
    return variant.height ? `${variant.height}p` : null;
  }

  bitrateLabel(variant: StreamVariant): string | null {
    const bitrate = variant.audioBitrate ?? variant.totalBitrate;
    return bitrate ? `${Math.round(bitrate)}kbps` : null;
  }
}
