import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../../config/app.config';
import {
  DownloadLinkSet,
  ResolveParams,
  StreamLink,
  StreamType,
  StreamVariant,
} from '../interfaces/video-info.interface';
import { VideoStreamService } from './stream.service';
import { toMebibytes, VideoFormatService } from './video-format.service';

interface GuessedItag {
  itag: number;
  label: string;
}

type GuessedQuality = 'high' | 'medium' | 'low';

/**
 * itags clásicos de YouTube por calidad; no se verifica que existan para el video
 */
const GUESSED_ITAGS: Record<GuessedQuality, { video: GuessedItag; audio: GuessedItag }> = {
  high: { video: { itag: 22, label: '720p' }, audio: { itag: 140, label: '128kbps' } },
  medium: { video: { itag: 18, label: '360p' }, audio: { itag: 140, label: '128kbps' } },
  low: { video: { itag: 17, label: '144p' }, audio: { itag: 139, label: '48kbps' } },
};

const PLACEHOLDER_CDN = 'https://dl.ymcdn.org';
const PLACEHOLDER_KEYS = {
  video: '04caafe31b0869a0601e4912f5170a6d',
  audio: '8ce857f5628c8c6d3fdde2a01f30e01b',
};

function wants(type: StreamType, kind: 'video' | 'audio'): boolean {
  return type === 'both' || type === kind;
}

function toGuessedQuality(quality: string): GuessedQuality {
  const normalized = quality.trim().toLowerCase();
  return normalized === 'medium' || normalized === 'low' ? normalized : 'high';
}

@Injectable()
export class StreamLinkService {
  private readonly logger = new Logger(StreamLinkService.name);

  constructor(
    private readonly videoStreamService: VideoStreamService,
    private readonly videoFormatService: VideoFormatService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) { }

  /**
   * Genera los enlaces pedidos según el origen configurado.
   * En modo "extracted" un fallo de yt-dlp degrada a enlaces adivinados.
   */
  async resolveLinks(videoId: string, params: Pick<ResolveParams, 'type' | 'quality'>): Promise<DownloadLinkSet> {
    switch (this.config.linkSource) {
      case 'placeholder':
        return this.placeholderLinks(videoId, params.type);
      case 'guessed':
        return this.guessedLinks(videoId, params.type, params.quality);
      case 'extracted': {
        const outcome = await this.videoStreamService.fetchStreams(videoId);
        if (outcome.ok) {
          return this.extractedLinks(outcome.info.catalog.progressive, outcome.info.catalog.audioOnly, params);
        }
        this.logger.warn(`⚠️ No se pudieron extraer enlaces (${outcome.failure.kind}), usando enlaces adivinados`);
        return this.guessedLinks(videoId, params.type, params.quality);
      }
    }
  }

  guessedLinks(videoId: string, type: StreamType, quality: string): DownloadLinkSet {
    const itags = GUESSED_ITAGS[toGuessedQuality(quality)];
    const build = (itag: GuessedItag, kind: 'video' | 'audio'): StreamLink => ({
      url: `https://rr2---sn-4g5ednsl.googlevideo.com/videoplayback?ip=0.0.0.0&id=${videoId}&itag=${itag.itag}&source=youtube&requiressl=yes&ratebypass=yes`,
      quality: kind === 'video' ? itag.label : null,
      bitrate: kind === 'audio' ? itag.label : null,
      sizeMb: null,
      verified: false,
    });

    return {
      source: 'guessed',
      video: wants(type, 'video') ? build(itags.video, 'video') : undefined,
      audio: wants(type, 'audio') ? build(itags.audio, 'audio') : undefined,
    };
  }

  placeholderLinks(videoId: string, type: StreamType): DownloadLinkSet {
    const build = (key: string): StreamLink => ({
      url: `${PLACEHOLDER_CDN}/${key}/${videoId}`,
      quality: null,
      bitrate: null,
      sizeMb: null,
      verified: false,
    });

    return {
      source: 'placeholder',
      video: wants(type, 'video') ? build(PLACEHOLDER_KEYS.video) : undefined,
      audio: wants(type, 'audio') ? build(PLACEHOLDER_KEYS.audio) : undefined,
    };
  }

  extractedLinks(
    progressive: StreamVariant[],
    audioOnly: StreamVariant[],
    params: Pick<ResolveParams, 'type' | 'quality'>,
  ): DownloadLinkSet {
    const toLink = (variant: StreamVariant | undefined): StreamLink | undefined => variant && {
      url: variant.url,
      quality: this.videoFormatService.qualityLabel(variant),
      bitrate: this.videoFormatService.bitrateLabel(variant),
      sizeMb: toMebibytes(variant.filesize),
      verified: true,
    };

    // Para video se prefieren MP4 progresivos, como hace la selección de formato de descarga
    const mp4 = progressive.filter(v => v.ext === 'mp4');
    const videoCandidates = mp4.length > 0 ? mp4 : progressive;

    return {
      source: 'extracted',
      video: wants(params.type, 'video')
        ? toLink(this.videoFormatService.pickByQuality(videoCandidates, params.quality))
        : undefined,
      audio: wants(params.type, 'audio')
        ? toLink(this.videoFormatService.pickByQuality(audioOnly, params.quality))
        : undefined,
    };
  }
}
