export { MangaBakaTalker, toHostError, type MangaBakaTalkerOptions } from './mangabaka-talker';
export * from './contract';
export { settingDefinitions, parseTalkerSettings, SETTING_KEYS, DEFAULT_SETTINGS, type TalkerSettings } from './settings';
export { toComicSeries, toGenericMetadata, pickPublisher } from './mapping';
