import { Test } from '@nestjs/testing';
import { VideoStreamService } from './stream.service';
import { VideoFormatService } from './video-format.service';
import { YtDlpCommandService, YtDlpOutcome } from './yt-dlp.service';

describe('VideoStreamService', () => {
  let service: VideoStreamService;
  let nextOutcome: YtDlpOutcome;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        VideoStreamService,
        VideoFormatService,
        {
          provide: YtDlpCommandService,
          useValue: { fetchVideoJson: async (): Promise<YtDlpOutcome> => nextOutcome },
        },
      ],
    }).compile();

    service = moduleRef.get(VideoStreamService);
  });

  it('parses yt-dlp output into a catalog', async () => {
    nextOutcome = {
      ok: true,
      stdout: JSON.stringify({
        id: 'kV1qVKlseIU',
        title: 'Test Video',
        duration: 125,
        formats: [
          { format_id: '18', url: 'https://cdn.test/18', ext: 'mp4', vcodec: 'avc1', acodec: 'mp4a', height: 360 },
          { format_id: '140', url: 'https://cdn.test/140', ext: 'm4a', vcodec: 'none', acodec: 'mp4a', abr: 129 },
        ],
      }),
    };

    const outcome = await service.fetchStreams('kV1qVKlseIU');

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.info.videoId).toBe('kV1qVKlseIU');
      expect(outcome.info.title).toBe('Test Video');
      expect(outcome.info.durationSeconds).toBe(125);
      expect(outcome.info.catalog.progressive.map(v => v.formatId)).toEqual(['18']);
      expect(outcome.info.catalog.audioOnly.map(v => v.formatId)).toEqual(['140']);
    }
  });

  it('passes yt-dlp failures through', async () => {
    nextOutcome = { ok: false, failure: { kind: 'rate-limited', detail: 'bot check' } };

    await expect(service.fetchStreams('kV1qVKlseIU')).resolves.toEqual({
      ok: false,
      failure: { kind: 'rate-limited', detail: 'bot check' },
    });
  });

  it('reports output that is not json', () => {
    const outcome = service.parseStreams('ERROR: nope');
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.kind).toBe('upstream-error');
      expect(outcome.failure.detail).toMatch(/^No se pudo parsear la salida de yt-dlp: /);
    }
  });

  it('reports json with an unexpected shape', () => {
    expect(service.parseStreams('{"title":"sin id"}')).toEqual({
      ok: false,
      failure: { kind: 'upstream-error', detail: 'La salida de yt-dlp no tiene el formato esperado' },
    });
  });
});
