import type { RemoteRecord } from '@/lib/schemas/mangabaka';

/** A complete, valid series record; override any field per test. */
export function seriesRecord(overrides: RemoteRecord = {}): RemoteRecord {
  return {
    id: 1,
    state: 'active',
    merged_with: null,
    title: 'Test Series',
    native_title: null,
    romanized_title: null,
    secondary_titles: null,
    cover: { raw: null, default: 'https://cdn.example.test/covers/1.jpg', small: null },
    authors: ['Author One'],
    artists: ['Artist One'],
    description: 'A test series.',
    year: 2001,
    status: 'completed',
    content_rating: 'safe',
    type: 'manga',
    rating: 8,
    final_volume: '10',
    final_chapter: '95',
    total_chapters: null,
    links: ['https://example.test/series/1'],
    publishers: [
      { name: 'Origin Press', type: 'Original', note: null },
      { name: 'English House', type: 'English', note: null },
    ],
    genres: ['action'],
    tags: ['ninja'],
    last_updated_at: '2024-01-01T00:00:00Z',
    source: null,
    ...overrides,
  };
}
