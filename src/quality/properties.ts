import { ConfigurationError } from '../errors.js';
import { Snapshot } from '../utils/snapshot.js';
import { ProjectRef } from './types.js';

export const PROPERTIES_FILE = 'analysis.properties';

/** `key=value` (or `key: value`) lines; `#` and `!` start comments. */
export function parseProperties(text: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#') || line.startsWith('!')) continue;
    const m = line.match(/^([^=:\s]+)\s*[=:]\s*(.*)$/);
    if (m) out[m[1]] = m[2].trim();
  }
  return out;
}

export function resolveProject(
  inputs: { projectKey?: string; organization?: string },
  tree: Snapshot
): ProjectRef {
  const file = tree.get(PROPERTIES_FILE);
  const props = file ? parseProperties(file.toString('utf8')) : {};
  const key = inputs.projectKey || props['project.key'];
  if (!key) {
    throw new ConfigurationError(`no project key: set the project-key input or project.key in ${PROPERTIES_FILE}`);
  }
  const organization = inputs.organization || props['project.organization'];
  return organization ? { key, organization } : { key };
}
