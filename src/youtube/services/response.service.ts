import { Inject, Injectable } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../../config/app.config';
import {
  Clock,
  CLOCK,
  ComposeResult,
  DownloadLinkSet,
  FormatEntryPayload,
  FormatsPayload,
  InfoPayload,
  ResolveParams,
  StreamLink,
  StreamLinkPayload,
  StreamVariant,
  VideoMetadata,
  VideoStreamInfo,
} from '../interfaces/video-info.interface';
import { UpstreamUnavailableException } from '../exceptions/video.exceptions';
import { VideoUrlService } from './url.service';
import { formatDuration, toMebibytes, VideoFormatService } from './video-format.service';

export interface ComposeInput {
  videoId: string;
  metadata: VideoMetadata;
  links: DownloadLinkSet;
  params: ResolveParams;
  startedAt: number;
}

const LINK_NOTE = 'Los enlaces pueden expirar. Úselos inmediatamente para descargar.';
const UNVERIFIED_NOTE = 'Enlaces no verificados: pueden no funcionar para este video.';

@Injectable()
export class ResponseComposerService {

  constructor(
    private readonly videoUrlService: VideoUrlService,
    private readonly videoFormatService: VideoFormatService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) { }

  /**
   * Segundos transcurridos desde startedAt, con 4 decimales
   */
  elapsedSeconds(startedAt: number): number {
    return Number(((this.clock.now() - startedAt) / 1000).toFixed(4));
  }

  /**
   * Estado legible de los metadatos
   */
  describeMetadata(metadata: VideoMetadata): string {
    if (metadata.retrievalSucceeded) {
      return 'ok';
    }

    const kind = metadata.failureKind ?? 'upstream-error';
    switch (kind) {
      case 'not-found':
        return 'El video no existe o fue eliminado';
      case 'restricted':
        return 'El video es privado, tiene restricción de edad o no permite inserción';
      case 'rate-limited':
        return 'YouTube limitó las peticiones; se usan metadatos de relleno';
      case 'timeout':
        return 'YouTube no respondió a tiempo; se usan metadatos de relleno';
      case 'network-error':
        return 'No se pudo contactar a YouTube; se usan metadatos de relleno';
      case 'upstream-error':
        return 'YouTube devolvió una respuesta inesperada; se usan metadatos de relleno';
      default: {
        const unhandled: never = kind;
        return unhandled;
      }
    }
  }

  alternativeMethods(videoId: string): string[] {
    return [
      `https://yt1s.com/youtube-to-mp4/${videoId}`,
      `https://yt5s.com/en/?q=https://youtube.com/watch?v=${videoId}`,
      `https://ssyoutube.com/watch?v=${videoId}`,
    ];
  }

  /**
   * Arma la respuesta de /api/resolve: redirección a un único enlace o JSON
   */
  compose(input: ComposeInput): ComposeResult {
    const { videoId, metadata, links, params } = input;

    if (params.download && params.type !== 'both') {
      const link = links[params.type];
      if (!link) {
        throw new UpstreamUnavailableException(`No hay enlace de ${params.type} disponible`);
      }
      return { kind: 'redirect', location: link.url };
    }

    const requested = [links.video, links.audio].filter((link): link is StreamLink => link !== undefined);
    const note = requested.some(link => !link.verified) ? `${LINK_NOTE} ${UNVERIFIED_NOTE}` : LINK_NOTE;

    return {
      kind: 'json',
      payload: {
        api_dev: this.config.attribution.developer,
        api_channel: this.config.attribution.channel,
        time_s: this.elapsedSeconds(input.startedAt),
        title: metadata.title,
        video_id: videoId,
        thumbnail: metadata.thumbnailUrl,
        author: metadata.author,
        metadata: {
          retrieved: metadata.retrievalSucceeded,
          source: metadata.source,
          status: this.describeMetadata(metadata),
          ...(metadata.errorDetail ? { error: metadata.errorDetail } : {}),
        },
        type: params.type,
        quality: params.quality,
        link_source: links.source,
        data: {
          ...(links.video ? { video: this.toLinkPayload(links.video) } : {}),
          ...(links.audio ? { audio: this.toLinkPayload(links.audio) } : {}),
        },
        note,
        alternative_methods: this.alternativeMethods(videoId),
      },
    };
  }

  /**
   * Respuesta de /api/info; exige metadatos reales
   */
  composeInfo(videoId: string, metadata: VideoMetadata, startedAt: number): InfoPayload {
    if (!metadata.retrievalSucceeded) {
      const kind = metadata.failureKind ?? 'upstream-error';
      const detail = metadata.errorDetail ? `: ${metadata.errorDetail}` : '';
      throw new UpstreamUnavailableException(`No se pudo obtener la información del video (${kind})${detail}`);
    }

    return {
      success: true,
      time_s: this.elapsedSeconds(startedAt),
      video_id: videoId,
      title: metadata.title,
      author: metadata.author,
      thumbnail: metadata.thumbnailUrl,
      duration: metadata.durationSeconds === null ? null : formatDuration(metadata.durationSeconds),
      duration_seconds: metadata.durationSeconds,
      video_url: this.videoUrlService.watchUrl(videoId),
      embed_url: this.videoUrlService.embedUrl(videoId),
      thumbnail_urls: this.videoUrlService.thumbnailUrls(videoId),
      source: metadata.source,
    };
  }

  /**
   * Respuesta de /api/formats con todas las variantes clasificadas
   */
  composeFormats(videoId: string, info: VideoStreamInfo, startedAt: number): FormatsPayload {
    const { progressive, videoOnly, audioOnly } = info.catalog;

    return {
      success: true,
      time_s: this.elapsedSeconds(startedAt),
      video_id: videoId,
      title: info.title,
      duration: info.durationSeconds === null ? null : formatDuration(info.durationSeconds),
      duration_seconds: info.durationSeconds,
      total: progressive.length + videoOnly.length + audioOnly.length,
      formats: {
        progressive: progressive.map(v => this.toFormatEntry(v)),
        video_only: videoOnly.map(v => this.toFormatEntry(v)),
        audio_only: audioOnly.map(v => this.toFormatEntry(v)),
      },
    };
  }

  private toLinkPayload(link: StreamLink): StreamLinkPayload {
    return {
      url: link.url,
      quality: link.quality,
      bitrate: link.bitrate,
      size_mb: link.sizeMb,
      verified: link.verified,
    };
  }

  private toFormatEntry(variant: StreamVariant): FormatEntryPayload {
    return {
      format_id: variant.formatId,
      ext: variant.ext,
      quality: this.videoFormatService.qualityLabel(variant),
      width: variant.width,
      height: variant.height,
      fps: variant.fps,
      vcodec: variant.vcodec,
      acodec: variant.acodec,
      bitrate_kbps: variant.totalBitrate,
      audio_bitrate_kbps: variant.audioBitrate,
      size_mb: toMebibytes(variant.filesize),
      url: variant.url,
    };
  }
}
