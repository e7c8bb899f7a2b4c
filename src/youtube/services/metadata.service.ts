import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../../config/app.config';
import {
  RetrievalFailure,
  RetrievalFailureKind,
  VideoMetadata,
} from '../interfaces/video-info.interface';
import { oEmbedSchema } from '../schemas/oembed.schema';
import { BROWSER_USER_AGENT, YoutubeHttpService } from './http.service';
import { VideoUrlService } from './url.service';

type MetadataAttempt =
  | { ok: true; metadata: VideoMetadata }
  | { ok: false; failure: RetrievalFailure };

const UNKNOWN_TITLE = 'Unknown Title';
const UNKNOWN_AUTHOR = 'Unknown Author';

const RESTRICTED_PLAYABILITY = new Set([
  'LOGIN_REQUIRED',
  'AGE_CHECK_REQUIRED',
  'CONTENT_CHECK_REQUIRED',
  'UNPLAYABLE',
]);

const HTML_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&quot;': '"',
  '&#39;': "'",
  '&#x27;': "'",
  '&lt;': '<',
  '&gt;': '>',
};

export function decodeHtmlEntities(text: string): string {
  return text.replace(/&(?:amp|quot|#39|#x27|lt|gt);/g, entity => HTML_ENTITIES[entity] ?? entity);
}

/**
 * Decodifica un literal de cadena JSON capturado del HTML (\u0026, \" ...)
 */
export function decodeJsonString(raw: string): string {
  try {
    const decoded: unknown = JSON.parse(`"${raw}"`);
    return typeof decoded === 'string' ? decoded : raw;
  } catch {
    return raw;
  }
}

/**
 * Los fallos "específicos" dicen algo del video en sí, no de la red
 */
function isSpecific(kind: RetrievalFailureKind): boolean {
  return kind === 'not-found' || kind === 'restricted';
}

@Injectable()
export class VideoMetadataService {
  private readonly logger = new Logger(VideoMetadataService.name);

  constructor(
    private readonly http: YoutubeHttpService,
    private readonly videoUrlService: VideoUrlService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) { }

  /**
   * Obtiene título, autor y miniatura del video.
   * Nunca lanza: si oEmbed y la página del video fallan, devuelve metadatos de relleno.
   */
  async fetch(videoId: string): Promise<VideoMetadata> {
    this.logger.log(`🔍 Obteniendo metadatos de ${videoId}...`);

    const primary = await this.fetchFromOEmbed(videoId);
    if (primary.ok) {
      this.logger.log(`✅ Metadatos obtenidos vía oEmbed`);
      return primary.metadata;
    }
    this.logger.warn(`⚠️ oEmbed falló (${primary.failure.kind}): ${primary.failure.detail}`);

    const fallback = await this.fetchFromWatchPage(videoId);
    if (fallback.ok) {
      this.logger.log(`✅ Metadatos obtenidos desde la página del video`);
      return fallback.metadata;
    }
    this.logger.warn(`⚠️ Página del video falló (${fallback.failure.kind}): ${fallback.failure.detail}`);

    const failure = !isSpecific(fallback.failure.kind) && isSpecific(primary.failure.kind)
      ? primary.failure
      : fallback.failure;

    return this.buildPlaceholder(videoId, failure);
  }

  /**
   * Como fetch, pero si oEmbed respondió completa la duración desde la página del video.
   * Si la página falla se devuelven los metadatos de oEmbed sin duración.
   */
  async fetchWithDuration(videoId: string): Promise<VideoMetadata> {
    const metadata = await this.fetch(videoId);
    if (metadata.source !== 'oembed' || metadata.durationSeconds !== null) {
      return metadata;
    }

    const page = await this.fetchFromWatchPage(videoId);
    if (!page.ok) {
      this.logger.warn(`⚠️ Sin duración para ${videoId} (${page.failure.kind}): ${page.failure.detail}`);
      return metadata;
    }

    return { ...metadata, durationSeconds: page.metadata.durationSeconds };
  }

  /**
   * Metadatos sintéticos derivados únicamente del ID
   */
  buildPlaceholder(videoId: string, failure: RetrievalFailure): VideoMetadata {
    return {
      videoId,
      title: `Video ${videoId}`,
      author: 'YouTube',
      thumbnailUrl: this.videoUrlService.placeholderThumbnailUrl(videoId),
      durationSeconds: null,
      retrievalSucceeded: false,
      source: 'placeholder',
      failureKind: failure.kind,
      errorDetail: failure.detail,
    };
  }

  private async fetchFromOEmbed(videoId: string): Promise<MetadataAttempt> {
    const watchUrl = this.videoUrlService.watchUrl(videoId);
    const oEmbedUrl = `https://www.youtube.com/oembed?url=${encodeURIComponent(watchUrl)}&format=json`;

    const outcome = await this.http.getText(oEmbedUrl, { timeoutMs: this.config.metadataTimeoutMs });
    if (!outcome.ok) {
      return outcome;
    }

    let json: unknown;
    try {
      json = JSON.parse(outcome.body);
    } catch (error) {
      return {
        ok: false,
        failure: {
          kind: 'upstream-error',
          detail: `Respuesta oEmbed no es JSON: ${error instanceof Error ? error.message : String(error)}`,
        },
      };
    }

    const parsed = oEmbedSchema.safeParse(json);
    if (!parsed.success) {
      return { ok: false, failure: { kind: 'upstream-error', detail: 'Respuesta oEmbed con formato inesperado' } };
    }

    return {
      ok: true,
      metadata: {
        videoId,
        title: parsed.data.title || UNKNOWN_TITLE,
        author: parsed.data.author_name || UNKNOWN_AUTHOR,
        thumbnailUrl: parsed.data.thumbnail_url || this.videoUrlService.thumbnailUrls(videoId).maxres,
        durationSeconds: null,
        retrievalSucceeded: true,
        source: 'oembed',
      },
    };
  }

  private async fetchFromWatchPage(videoId: string): Promise<MetadataAttempt> {
    const outcome = await this.http.getText(this.videoUrlService.watchUrl(videoId), {
      timeoutMs: this.config.fallbackTimeoutMs,
      headers: {
        'User-Agent': BROWSER_USER_AGENT,
        'Accept-Language': 'en-US,en;q=0.9',
      },
    });
    if (!outcome.ok) {
      return outcome;
    }

    return this.parseWatchPage(videoId, outcome.body);
  }

  /**
   * Extrae metadatos del HTML de /watch mediante búsqueda de patrones
   */
  parseWatchPage(videoId: string, html: string): MetadataAttempt {
    const playability = html.match(/"playabilityStatus":\{"status":"([A-Z_]+)"/)?.[1];
    if (playability === 'ERROR') {
      return { ok: false, failure: { kind: 'not-found', detail: 'Video no disponible' } };
    }
    if (playability && RESTRICTED_PLAYABILITY.has(playability)) {
      return { ok: false, failure: { kind: 'restricted', detail: `Reproducción restringida: ${playability}` } };
    }

    const title = html.match(/<meta name="title" content="([^"]+)"/)?.[1];
    const author = html.match(/"author":"((?:[^"\\]|\\.)+)"/)?.[1];
    const thumbnailJson = html.match(/"thumbnailUrl":\["((?:[^"\\]|\\.)+)"\]/)?.[1];
    const thumbnail = thumbnailJson
      ? decodeJsonString(thumbnailJson)
      : html.match(/<meta property="og:image" content="([^"]+)"/)?.[1];
    const lengthSeconds = html.match(/"lengthSeconds":"(\d+)"/)?.[1];

    return {
      ok: true,
      metadata: {
        videoId,
        title: title ? decodeHtmlEntities(title) : UNKNOWN_TITLE,
        author: author ? decodeHtmlEntities(decodeJsonString(author)) : UNKNOWN_AUTHOR,
        thumbnailUrl: thumbnail ?? this.videoUrlService.thumbnailUrls(videoId).maxres,
        durationSeconds: lengthSeconds ? parseInt(lengthSeconds, 10) : null,
        retrievalSucceeded: true,
        source: 'watch-page',
      },
    };
  }
}
