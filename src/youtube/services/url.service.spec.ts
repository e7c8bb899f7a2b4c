import { VideoUrlService } from './url.service';
import { InvalidVideoIdException } from '../exceptions/video.exceptions';

describe('VideoUrlService', () => {
  const service = new VideoUrlService();
  const id = 'kV1qVKlseIU';

  describe('resolve', () => {
    it.each([
      [`https://youtu.be/${id}`],
      [`https://youtu.be/${id}?si=abc123`],
      [`https://www.youtube.com/watch?v=${id}`],
      [`https://www.youtube.com/watch?v=${id}&t=42s&list=PL123`],
      [`https://m.youtube.com/watch?v=${id}`],
      [`https://www.youtube.com/shorts/${id}`],
      [`https://www.youtube.com/embed/${id}?autoplay=1`],
      [`https://www.youtube.com/v/${id}`],
      [`https://www.youtube.com/live/${id}`],
      [`youtube.com/watch?v=${id}`],
      [`https://www.youtube.com/watch?feature=share&v=${id}`],
      [`https://img.youtube.com/vi/${id}/0.jpg`],
      [`https://www.youtube.com/watch#!v=${id}`],
      [`v=${id}`],
      [`https://www.youtube.com/watch?feature=share;v=${id}`],
      [id],
      [`  ${id}  `],
    ])('extracts the identifier from %s', input => {
      expect(service.resolve(input)).toEqual({ ok: true, videoId: id });
    });

    it('keeps underscores, hyphens and case untouched', () => {
      expect(service.resolve('https://youtu.be/a_B-c_D-e_F')).toEqual({ ok: true, videoId: 'a_B-c_D-e_F' });
      expect(service.resolve('-_-_-_-_-_-')).toEqual({ ok: true, videoId: '-_-_-_-_-_-' });
    });

    it('is idempotent on a bare identifier', () => {
      const first = service.resolve(id);
      expect(first.ok).toBe(true);
      if (first.ok) {
        expect(service.resolve(first.videoId)).toEqual(first);
      }
    });

    it.each([
      [''],
      ['abcdefghij'],
      ['abcdefghijkl'],
      ['https://www.youtube.com/watch?x=1'],
      ['https://www.youtube.com/'],
      ['https://youtu.be/short'],
      ['not a url at all'],
    ])('fails for %p', input => {
      expect(service.resolve(input)).toEqual({ ok: false, reason: 'invalid-format' });
    });

    it('accepts any 11-character token as a bare identifier', () => {
      expect(service.resolve('notavalidid')).toEqual({ ok: true, videoId: 'notavalidid' });
    });
  });

  describe('extractVideoId', () => {
    it('returns the identifier', () => {
      expect(service.extractVideoId(`https://youtu.be/${id}`)).toBe(id);
    });

    it('throws a client error when nothing matches', () => {
      expect(() => service.extractVideoId('https://example.com/video')).toThrow(InvalidVideoIdException);
    });
  });

  describe('derived urls', () => {
    it('builds watch and embed urls', () => {
      expect(service.watchUrl(id)).toBe('https://www.youtube.com/watch?v=kV1qVKlseIU');
      expect(service.embedUrl(id)).toBe('https://www.youtube.com/embed/kV1qVKlseIU');
    });

    it('derives the five fixed-resolution thumbnails', () => {
      expect(service.thumbnailUrls(id)).toEqual({
        default: 'https://img.youtube.com/vi/kV1qVKlseIU/default.jpg',
        medium: 'https://img.youtube.com/vi/kV1qVKlseIU/mqdefault.jpg',
        high: 'https://img.youtube.com/vi/kV1qVKlseIU/hqdefault.jpg',
        standard: 'https://img.youtube.com/vi/kV1qVKlseIU/sddefault.jpg',
        maxres: 'https://img.youtube.com/vi/kV1qVKlseIU/maxresdefault.jpg',
      });
      expect(service.thumbnailUrls(id)).toEqual(service.thumbnailUrls(id));
    });
  });
});
