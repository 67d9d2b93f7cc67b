import { z } from 'zod';
import { MANGABAKA_SOURCE, DEFAULT_API_URL } from '../config/env-validation';
import { CONTENT_RATINGS, SERIES_FORMATS, type ContentRating, type SeriesFormat } from '../metadata/types';
import type { CandidateFilters } from '../search/filters';
import { ConfigurationError } from '../talker-errors';
import type { RawSettings, SettingDefinition } from './contract';

const PREFIX = 'mangabaka';

export const SETTING_KEYS = {
  useSeriesStartAsVolume: `${PREFIX}_use_series_start_as_volume`,
  useOriginalPublisher: `${PREFIX}_use_original_publisher`,
  ageFilter: `${PREFIX}_age_filter`,
  filterDojin: `${PREFIX}_filter_dojin`,
  filterType: `${PREFIX}_filter_type`,
  url: `${PREFIX}_url`,
  apiKey: `${PREFIX}_key`,
} as const;

/** Hosts hand flags over as booleans or as "true"/"false" from the command line. */
const flag = (fallback: boolean) =>
  z
    .union([z.boolean(), z.enum(['true', 'false']).transform((value) => value === 'true')])
    .default(fallback);

const FORMAT_CHOICES = ['', ...SERIES_FORMATS] as const;

const SettingsSchema = z.object({
  [SETTING_KEYS.useSeriesStartAsVolume]: flag(false),
  [SETTING_KEYS.useOriginalPublisher]: flag(false),
  [SETTING_KEYS.ageFilter]: z.enum(CONTENT_RATINGS).default('safe'),
  [SETTING_KEYS.filterDojin]: flag(true),
  [SETTING_KEYS.filterType]: z.enum(FORMAT_CHOICES).default(''),
  [SETTING_KEYS.url]: z.string().trim().default(''),
  [SETTING_KEYS.apiKey]: z.string().trim().default(''),
});

export interface TalkerSettings {
  useSeriesStartAsVolume: boolean;
  useOriginalPublisher: boolean;
  ageFilter: ContentRating;
  filterDojin: boolean;
  filterType: SeriesFormat | undefined;
  url: string;
  apiKey: string;
}

export const DEFAULT_SETTINGS: TalkerSettings = {
  useSeriesStartAsVolume: false,
  useOriginalPublisher: false,
  ageFilter: 'safe',
  filterDojin: true,
  filterType: undefined,
  url: '',
  apiKey: '',
};

export function settingDefinitions(): SettingDefinition[] {
  return [
    {
      key: SETTING_KEYS.useSeriesStartAsVolume,
      displayName: 'Use series start as volume',
      kind: 'boolean',
      default: false,
      persisted: true,
    },
    {
      key: SETTING_KEYS.useOriginalPublisher,
      displayName: 'Use the original publisher',
      help: 'Use the original publisher instead of English language publisher',
      kind: 'boolean',
      default: false,
      persisted: true,
    },
    {
      key: SETTING_KEYS.ageFilter,
      displayName: 'Age rating filter:',
      help: 'Select the level of age rating filtering. *Not guaranteed, relies on correct tagging*',
      kind: 'choice',
      default: 'safe',
      choices: CONTENT_RATINGS,
      persisted: true,
    },
    {
      key: SETTING_KEYS.filterDojin,
      displayName: 'Filter out dojin results',
      help: 'Filter out dojin from the search results (Genre: Doujinshi)',
      kind: 'boolean',
      default: true,
      persisted: true,
    },
    {
      key: SETTING_KEYS.filterType,
      displayName: 'Filter for only type',
      help: "Filter out all other 'types' other than selected",
      kind: 'choice',
      default: '',
      choices: FORMAT_CHOICES,
      persisted: true,
    },
    {
      key: SETTING_KEYS.url,
      displayName: 'API URL',
      help: `Use the given ${MANGABAKA_SOURCE} URL. (default: ${DEFAULT_API_URL})`,
      kind: 'string',
      default: '',
      persisted: true,
    },
    {
      key: SETTING_KEYS.apiKey,
      displayName: 'API key',
      kind: 'secret',
      default: '',
      persisted: false,
    },
  ];
}

/**
 * Validates the host's flat settings. Unrelated keys (other talkers, host
 * options) are ignored; missing keys take their defaults.
 *
 * @throws {ConfigurationError} listing every invalid setting
 */
export function parseTalkerSettings(raw: RawSettings): TalkerSettings {
  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    const errorMessage = [
      'Settings validation failed:',
      ...result.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`),
    ].join('\n');
    throw new ConfigurationError(MANGABAKA_SOURCE, errorMessage);
  }

  const data = result.data;
  const filterType = data[SETTING_KEYS.filterType];
  return {
    useSeriesStartAsVolume: data[SETTING_KEYS.useSeriesStartAsVolume],
    useOriginalPublisher: data[SETTING_KEYS.useOriginalPublisher],
    ageFilter: data[SETTING_KEYS.ageFilter],
    filterDojin: data[SETTING_KEYS.filterDojin],
    filterType: filterType === '' ? undefined : filterType,
    url: data[SETTING_KEYS.url],
    apiKey: data[SETTING_KEYS.apiKey],
  };
}

/** The flat form the host stores, defaults filled in. */
export function toRawSettings(settings: TalkerSettings): Record<string, string | boolean> {
  return {
    [SETTING_KEYS.useSeriesStartAsVolume]: settings.useSeriesStartAsVolume,
    [SETTING_KEYS.useOriginalPublisher]: settings.useOriginalPublisher,
    [SETTING_KEYS.ageFilter]: settings.ageFilter,
    [SETTING_KEYS.filterDojin]: settings.filterDojin,
    [SETTING_KEYS.filterType]: settings.filterType ?? '',
    [SETTING_KEYS.url]: settings.url,
    [SETTING_KEYS.apiKey]: settings.apiKey,
  };
}

export function toCandidateFilters(settings: TalkerSettings): CandidateFilters {
  return {
    maxContentRating: settings.ageFilter,
    excludeDoujinshi: settings.filterDojin,
    format: settings.filterType,
  };
}
