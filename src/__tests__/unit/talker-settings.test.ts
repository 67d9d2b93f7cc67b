import {
  DEFAULT_SETTINGS,
  SETTING_KEYS,
  parseTalkerSettings,
  settingDefinitions,
  toCandidateFilters,
  toRawSettings,
} from '@/lib/talker/settings';
import { ConfigurationError } from '@/lib/talker-errors';

describe('talker settings', () => {
  it('defaults every setting when the host sends none', () => {
    expect(parseTalkerSettings({})).toEqual(DEFAULT_SETTINGS);
  });

  it('parses the flat host keys', () => {
    const settings = parseTalkerSettings({
      mangabaka_use_series_start_as_volume: true,
      mangabaka_use_original_publisher: 'true',
      mangabaka_age_filter: 'erotica',
      mangabaka_filter_dojin: 'false',
      mangabaka_filter_type: 'manhwa',
      mangabaka_url: ' http://localhost:8080/v1 ',
      mangabaka_key: 'test-secret',
      other_talker_url: 'ignored',
    });

    expect(settings).toEqual({
      useSeriesStartAsVolume: true,
      useOriginalPublisher: true,
      ageFilter: 'erotica',
      filterDojin: false,
      filterType: 'manhwa',
      url: 'http://localhost:8080/v1',
      apiKey: 'test-secret',
    });
  });

  it('rejects an unknown rating level with a ConfigurationError', () => {
    expect(() => parseTalkerSettings({ mangabaka_age_filter: 'everything' })).toThrow(ConfigurationError);
    expect(() => parseTalkerSettings({ mangabaka_age_filter: 'everything' })).toThrow(
      /mangabaka_age_filter/
    );
  });

  it('rejects a format outside the provider types', () => {
    expect(() => parseTalkerSettings({ mangabaka_filter_type: 'comic' })).toThrow(ConfigurationError);
  });

  it('round-trips through the flat form', () => {
    const settings = parseTalkerSettings({ mangabaka_age_filter: 'suggestive', mangabaka_filter_type: 'novel' });

    expect(parseTalkerSettings(toRawSettings(settings))).toEqual(settings);
    expect(toRawSettings(DEFAULT_SETTINGS)[SETTING_KEYS.filterType]).toBe('');
  });

  it('derives candidate filters', () => {
    expect(toCandidateFilters({ ...DEFAULT_SETTINGS, ageFilter: 'erotica', filterType: 'oel' })).toEqual({
      maxContentRating: 'erotica',
      excludeDoujinshi: true,
      format: 'oel',
    });
  });

  it('registers one definition per key and keeps the key out of settings files', () => {
    const definitions = settingDefinitions();

    expect(definitions.map((d) => d.key).sort()).toEqual(Object.values(SETTING_KEYS).sort());
    expect(definitions.find((d) => d.key === SETTING_KEYS.apiKey)).toMatchObject({
      kind: 'secret',
      persisted: false,
    });
    expect(definitions.find((d) => d.key === SETTING_KEYS.ageFilter)?.choices).toEqual([
      'safe',
      'suggestive',
      'erotica',
      'pornographic',
    ]);
  });
});
