// src/common/config/parse.ts
import YAML from 'yaml';

/** Config file names probed in each directory, in priority order. */
export const CONFIG_FILE_NAMES = [
  'wfmon.config.yml',
  'wfmon.config.yaml',
  'wfmon.config.json',
] as const;

/**
 * Parse configuration text based on file extension.
 * - JSON when path ends with ".json"
 * - YAML otherwise
 * An empty document parses to an empty object.
 */
export const parseConfigText = (p: string, text: string): unknown => {
  if (text.trim() === '') return {};
  const doc: unknown = p.endsWith('.json')
    ? JSON.parse(text)
    : YAML.parse(text);
  return doc ?? {};
};
