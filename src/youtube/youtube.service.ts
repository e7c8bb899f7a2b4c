import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  Clock,
  CLOCK,
  ComposeResult,
  FormatsPayload,
  InfoPayload,
  ResolveParams,
} from './interfaces/video-info.interface';
import { UpstreamUnavailableException } from './exceptions/video.exceptions';
import { StreamLinkService } from './services/link.service';
import { VideoMetadataService } from './services/metadata.service';
import { ResponseComposerService } from './services/response.service';
import { VideoStreamService } from './services/stream.service';
import { VideoUrlService } from './services/url.service';

/**
 * Servicio principal que coordina todas las operaciones de YouTube
 * Actúa como facade para los servicios especializados
 */
@Injectable()
export class YoutubeService {
  private readonly logger = new Logger(YoutubeService.name);

  constructor(
    private readonly urlService: VideoUrlService,
    private readonly metadataService: VideoMetadataService,
    private readonly linkService: StreamLinkService,
    private readonly streamService: VideoStreamService,
    private readonly composer: ResponseComposerService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) { }

  /**
   * Resuelve una URL en metadatos y enlaces de descarga
   */
  async resolve(url: string, params: ResolveParams): Promise<ComposeResult> {
    const startedAt = this.clock.now();
    const videoId = this.urlService.extractVideoId(url);
    this.logger.log(`📺 Video ID: ${videoId} (type=${params.type}, quality=${params.quality})`);

    const [metadata, links] = await Promise.all([
      this.metadataService.fetch(videoId),
      this.linkService.resolveLinks(videoId, params),
    ]);

    return this.composer.compose({ videoId, metadata, links, params, startedAt });
  }

  /**
   * Obtiene información de un video sin generar enlaces
   */
  async getVideoInfo(url: string): Promise<InfoPayload> {
    const startedAt = this.clock.now();
    const videoId = this.urlService.extractVideoId(url);

    const metadata = await this.metadataService.fetchWithDuration(videoId);
    return this.composer.composeInfo(videoId, metadata, startedAt);
  }

  /**
   * Enumera todos los formatos disponibles del video
   */
  async getFormats(url: string): Promise<FormatsPayload> {
    const startedAt = this.clock.now();
    const videoId = this.urlService.extractVideoId(url);

    const outcome = await this.streamService.fetchStreams(videoId);
    if (!outcome.ok) {
      throw new UpstreamUnavailableException(
        `No se pudieron obtener los formatos del video (${outcome.failure.kind}): ${outcome.failure.detail}`,
      );
    }

    return this.composer.composeFormats(videoId, outcome.info, startedAt);
  }
}
