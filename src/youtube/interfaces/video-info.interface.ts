import { LinkSource } from '../../config/app.config';

export type StreamType = 'video' | 'audio' | 'both';

export type IdResolution =
  | { ok: true; videoId: string }
  | { ok: false; reason: 'invalid-format' };

export type RetrievalFailureKind =
  | 'not-found'
  | 'restricted'
  | 'rate-limited'
  | 'timeout'
  | 'upstream-error'
  | 'network-error';

export interface RetrievalFailure {
  kind: RetrievalFailureKind;
  detail: string;
}

export type MetadataSource = 'oembed' | 'watch-page' | 'placeholder';

export interface VideoMetadata {
  videoId: string;
  title: string;
  author: string;
  thumbnailUrl: string;
  durationSeconds: number | null; // Solo disponible desde la página del video
  retrievalSucceeded: boolean;
  source: MetadataSource;
  failureKind?: RetrievalFailureKind;
  errorDetail?: string;
}

export interface ThumbnailUrls {
  default: string;
  medium: string;
  high: string;
  standard: string;
  maxres: string;
}

export interface StreamLink {
  url: string;
  quality: string | null; // ej: "720p"
  bitrate: string | null; // ej: "128kbps"
  sizeMb: number | null;
  verified: boolean; // false para enlaces adivinados o de demostración
}

export interface DownloadLinkSet {
  source: LinkSource;
  video?: StreamLink;
  audio?: StreamLink;
}

export interface StreamVariant {
  formatId: string;
  ext: string;
  url: string;
  width: number | null;
  height: number | null;
  fps: number | null;
  vcodec: string;
  acodec: string;
  totalBitrate: number | null; // kbps
  audioBitrate: number | null; // kbps
  filesize: number | null; // bytes, exacto o aproximado
}

export interface StreamCatalog {
  progressive: StreamVariant[];
  videoOnly: StreamVariant[];
  audioOnly: StreamVariant[];
}

export interface VideoStreamInfo {
  videoId: string;
  title: string | null;
  durationSeconds: number | null;
  catalog: StreamCatalog;
}

export interface ResolveParams {
  type: StreamType;
  quality: string;
  download: boolean;
}

export interface StreamLinkPayload {
  url: string;
  quality: string | null;
  bitrate: string | null;
  size_mb: number | null;
  verified: boolean;
}

export interface ResolvePayload {
  api_dev: string;
  api_channel: string;
  time_s: number;
  title: string;
  video_id: string;
  thumbnail: string;
  author: string;
  metadata: {
    retrieved: boolean;
    source: MetadataSource;
    status: string;
    error?: string;
  };
  type: StreamType;
  quality: string;
  link_source: LinkSource;
  data: {
    video?: StreamLinkPayload;
    audio?: StreamLinkPayload;
  };
  note: string;
  alternative_methods: string[];
}

export type ComposeResult =
  | { kind: 'json'; payload: ResolvePayload }
  | { kind: 'redirect'; location: string };

export interface InfoPayload {
  success: true;
  time_s: number;
  video_id: string;
  title: string;
  author: string;
  thumbnail: string;
  duration: string | null; // Formato "M:SS"
  duration_seconds: number | null;
  video_url: string;
  embed_url: string;
  thumbnail_urls: ThumbnailUrls;
  source: MetadataSource;
}

export interface FormatEntryPayload {
  format_id: string;
  ext: string;
  quality: string | null;
  width: number | null;
  height: number | null;
  fps: number | null;
  vcodec: string;
  acodec: string;
  bitrate_kbps: number | null;
  audio_bitrate_kbps: number | null;
  size_mb: number | null;
  url: string;
}

export interface FormatsPayload {
  success: true;
  time_s: number;
  video_id: string;
  title: string | null;
  duration: string | null;
  duration_seconds: number | null;
  total: number;
  formats: {
    progressive: FormatEntryPayload[];
    video_only: FormatEntryPayload[];
    audio_only: FormatEntryPayload[];
  };
}

export interface Clock {
  now(): number; // milisegundos
}

export const CLOCK = 'CLOCK';
